import { isIPv4 } from 'node:net';
import { parseArgs } from 'node:util';

export const USAGE = [
  'Usage: slotmux <command> [--config <path>]',
  'Commands:',
  '  serve              Run the multiplexed server',
  '  hello-server       Run the handshake server',
  '  hello <ipv4>       Request a hello from a handshake server',
].join('\n');

/**
 * A parsed command line.
 */
export type Command =
  | { name: 'serve'; config?: string }
  | { name: 'hello-server'; config?: string }
  | { name: 'hello'; address: string; config?: string }
  | { name: 'help' };

/**
 * Parse CLI arguments (without the node and script entries).
 * @throws Error with a user-facing message on bad input
 */
export function parseCommand(argv: string[]): Command {
  const parsed = parseArgs({
    args: argv,
    options: {
      config: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
    strict: true,
  });

  const [name, ...rest] = parsed.positionals;
  const config = parsed.values.config;

  if (parsed.values.help || name === undefined || name === 'help') {
    return { name: 'help' };
  }

  switch (name) {
    case 'serve':
    case 'hello-server':
      if (rest.length > 0) {
        throw new Error(`'${name}' takes no arguments`);
      }
      return { name, config };
    case 'hello': {
      const address = rest[0];
      if (address === undefined || rest.length > 1) {
        throw new Error('Usage: slotmux hello <ipv4>');
      }
      if (!isIPv4(address)) {
        throw new Error(`'${address}' is not an IPv4 address`);
      }
      return { name, address, config };
    }
    default:
      throw new Error(`Unknown command '${name}'. Use: serve, hello-server, hello`);
  }
}
