import { ArgumentParser } from 'argparse';

import { CliOverrides } from '../config/configuration';

interface ParsedArgs {
  serial?: string | null;
  baud?: number | null;
  publish_port?: number | null;
  stationary: boolean;
  debug: boolean;
  quiet: boolean;
}

function buildParser(): ArgumentParser {
  const parser = new ArgumentParser({
    prog: 'fpv-bridge',
    description:
      'Reads JSON lines from an FPV detection sensor, adds GPS position and publishes them over WebSocket.',
  });

  parser.add_argument('--serial', {
    help: 'Serial device path (default: /dev/ttyACM0 or SERIAL_DEVICE)',
  });

  parser.add_argument('--baud', {
    type: 'int',
    help: 'Baud rate for the serial link (default: 115200 or SERIAL_BAUD)',
  });

  parser.add_argument('--publish-port', '--port', {
    dest: 'publish_port',
    type: 'int',
    help: 'Port the WebSocket publisher binds on (default: 4020 or PUBLISH_PORT)',
  });

  parser.add_argument('--stationary', {
    action: 'store_true',
    help: 'Read the GPS position once at startup and reuse it for every message',
  });

  parser.add_argument('--debug', {
    action: 'store_true',
    help: 'Enable debug logging',
  });

  parser.add_argument('--quiet', {
    action: 'store_true',
    help: 'Only log warnings and errors',
  });

  return parser;
}

export function parseCliArgs(argv: string[] = process.argv.slice(2)): CliOverrides {
  const cleaned = argv.length > 0 && argv[0] === '--' ? argv.slice(1) : argv;
  const args = buildParser().parse_args(cleaned) as ParsedArgs;

  const overrides: CliOverrides = {};
  if (args.serial) {
    overrides.devicePath = args.serial;
  }
  if (typeof args.baud === 'number') {
    overrides.baudRate = args.baud;
  }
  if (typeof args.publish_port === 'number') {
    overrides.publishPort = args.publish_port;
  }
  if (args.stationary) {
    overrides.stationary = true;
  }
  if (args.debug) {
    overrides.logLevel = 'debug';
  } else if (args.quiet) {
    overrides.logLevel = 'warn';
  }
  return overrides;
}
