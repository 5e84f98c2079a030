import { Command } from 'commander';
import { createFormatCommand } from './commands/format.js';
import { createTokenUriCommand } from './commands/token-uri.js';
import { createDisplayCommand } from './commands/display.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('uint256-strings')
    .description('Format uint256 values as decimal and hex strings')
    .version('0.1.0');

  program.addCommand(createFormatCommand());
  program.addCommand(createTokenUriCommand());
  program.addCommand(createDisplayCommand());

  program.addHelpText('after', `

Examples:
  $ uint256-strings format 255              Decimal and minimal hex
  $ uint256-strings format 0xff --width 8   Also pad hex to 8 digits
  $ uint256-strings token-uri 42            Metadata URI for token #42
  $ uint256-strings display 12345           All notations side by side

Environment:
  TOKEN_URI_BASE        Base URL for token-uri (default https://api.example.com/token)
  TOKEN_URI_HEX_WIDTH   Minimum hex digits in the URI (default 8)
  LOG_LEVEL             pino log level (default info)
`);

  return program;
}
