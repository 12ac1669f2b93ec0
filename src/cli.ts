import { parseArgs } from 'node:util';

export interface CliOptions {
  /** Show the browser window instead of running headless */
  headed: boolean;
  /** Deliver notifications to the configured channels */
  notify: boolean;
  /** Run a single cycle and exit */
  once: boolean;
  debug: boolean;
  help: boolean;
}

export const USAGE = `Usage: tipbot [options]

  --headed   run the browser with a visible window
  --notify   send cycle summaries to the configured notification channels
  --once     run one tipping cycle and exit
  --debug    verbose logging
  -h, --help show this message

Configuration is read from the environment (KICKTIPP_EMAIL, KICKTIPP_PASSWORD,
KICKTIPP_NAME_OF_COMPETITION, ...).`;

/** @throws TypeError on unknown flags */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      headed: { type: 'boolean', default: false },
      notify: { type: 'boolean', default: false },
      once: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  return {
    headed: values.headed ?? false,
    notify: values.notify ?? false,
    once: values.once ?? false,
    debug: values.debug ?? false,
    help: values.help ?? false,
  };
}
