import type { Page } from 'playwright-core';
import { AuthenticationError, FetchError, SubmitError, TransientSiteError } from '../errors.js';
import type { Credentials, SiteDriver, TippedState } from '../types/driver.js';
import type { Match } from '../types/match.js';
import type { Tip } from '../types/prediction.js';
import { logger } from '../utils/logger.js';
import { type BrowserPool, type BrowserSession, isTimeoutError } from '../workers/browser-pool.js';
import { parseTippingPage } from './kicktipp-parser.js';

export type KicktippSession = BrowserSession;

const LOGIN_PATH = '/info/profil/login/';
const CONSENT_FRAME = 'iframe[id*="sp_message_iframe"]';

/**
 * Kicktipp driver.
 *
 * Login form: #kennung / #passwort, submitted via [name=submitbutton].
 * A failed login leaves the browser on the login page.
 *
 * Tipping form at /{competition}/tippabgabe:
 *   - Table: #tippabgabeSpiele, see parseTippingPage for the row layout
 *   - Inputs: spieltippForms[<id>].heimTipp / .gastTipp
 *   - One submit button for the whole form: [name=submitbutton]
 */
export class KicktippAdapter implements SiteDriver<KicktippSession> {
  constructor(
    private readonly pool: BrowserPool,
    private readonly baseUrl: string,
  ) {}

  private url(path: string): string {
    return `${this.baseUrl}${path}`;
  }

  private tippingUrl(competition: string): string {
    return this.url(`/${encodeURIComponent(competition)}/tippabgabe`);
  }

  private isLoginPage(page: Page): boolean {
    return page.url().includes(LOGIN_PATH);
  }

  /** Maps browser failures onto the retryable error class. */
  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof AuthenticationError || err instanceof FetchError || err instanceof SubmitError) {
        throw err;
      }
      const reason = isTimeoutError(err) ? 'timed out' : 'failed';
      throw new TransientSiteError(`${action} ${reason}: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }

  private async acceptConsent(page: Page): Promise<void> {
    if ((await page.locator(CONSENT_FRAME).count()) === 0) return;

    await page
      .frameLocator(CONSENT_FRAME)
      .getByRole('button', { name: 'Akzeptieren' })
      .click({ timeout: 3000 })
      .then(() => logger.debug('Consent dialog accepted'))
      .catch((err: unknown) => logger.debug({ err }, 'Consent dialog could not be accepted'));
  }

  private async openTippingPage(session: KicktippSession, competition: string): Promise<string> {
    const { page } = session;
    return this.guard('Loading tipping page', async () => {
      await page.goto(this.tippingUrl(competition), { waitUntil: 'domcontentloaded' });
      if (this.isLoginPage(page)) {
        throw new AuthenticationError('Session expired, redirected to the login page');
      }
      await this.acceptConsent(page);
      return page.content();
    });
  }

  async authenticate(credentials: Credentials): Promise<KicktippSession> {
    const session = await this.pool.openSession();
    const { page } = session;

    try {
      await this.guard('Login', async () => {
        await page.goto(this.url(LOGIN_PATH), { waitUntil: 'domcontentloaded' });
        await this.acceptConsent(page);
        await page.fill('#kennung', credentials.email);
        await page.fill('#passwort', credentials.password);
        await Promise.all([
          page.waitForLoadState('domcontentloaded'),
          page.click('[name="submitbutton"]'),
        ]);
      });

      if (this.isLoginPage(page)) {
        throw new AuthenticationError('Login rejected, still on the login page');
      }
      logger.info('Logged in to Kicktipp');
      return session;
    } catch (err) {
      await this.pool.closeSession(session).catch((closeErr: unknown) => {
        logger.warn({ err: closeErr }, 'Failed to close browser context after login failure');
      });
      if (err instanceof AuthenticationError) throw err;
      throw new AuthenticationError(`Login failed: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }

  async listMatches(session: KicktippSession, competition: string): Promise<Match[]> {
    const html = await this.openTippingPage(session, competition);
    const parsed = parseTippingPage(html, competition);
    if (!parsed.tableFound) {
      throw new FetchError(`No tipping table found for competition "${competition}"`);
    }
    logger.debug({ count: parsed.matches.length }, 'Matches read from tipping page');
    return parsed.matches;
  }

  async submitTip(session: KicktippSession, competition: string, tip: Tip): Promise<void> {
    await this.openTippingPage(session, competition);
    const { page } = session;

    await this.guard('Submitting tip', async () => {
      const homeField = page.locator(`input[name="spieltippForms[${tip.matchId}].heimTipp"]`);
      const awayField = page.locator(`input[name="spieltippForms[${tip.matchId}].gastTipp"]`);
      if ((await homeField.count()) === 0 || (await awayField.count()) === 0) {
        throw new SubmitError(`Tip fields for match ${tip.matchId} are gone, match probably closed`);
      }

      await homeField.fill(String(tip.scoreline.home));
      await awayField.fill(String(tip.scoreline.away));

      const submit = page.locator('[name="submitbutton"]').first();
      await submit.scrollIntoViewIfNeeded();
      await Promise.all([page.waitForLoadState('domcontentloaded'), submit.click()]);
    });
  }

  async verifyTip(session: KicktippSession, competition: string, matchId: string): Promise<TippedState> {
    const html = await this.openTippingPage(session, competition);
    const match = parseTippingPage(html, competition).matches.find((m) => m.id === matchId);
    if (!match) return { tipped: false, scoreline: null };
    return { tipped: match.tipStatus === 'tipped', scoreline: match.currentTip };
  }

  async closeSession(session: KicktippSession): Promise<void> {
    await this.pool.closeSession(session);
  }
}
