import { Command, InvalidArgumentError } from 'commander';
import { parseUint256 } from '@uint256-strings/core';
import { createCliContext, runAction } from '../context.js';

interface FormatOptions {
  width?: number;
}

function parseWidth(raw: string): number {
  const width = Number(raw);
  if (!/^[0-9]+$/.test(raw) || !Number.isSafeInteger(width)) {
    throw new InvalidArgumentError('Width must be a non-negative integer.');
  }
  return width;
}

export function createFormatCommand(): Command {
  return new Command('format')
    .description('Print the decimal and hex forms of a uint256')
    .argument('<value>', 'Decimal or 0x-prefixed hex value')
    .option('-w, --width <digits>', 'Also print hex padded to at least this many digits', parseWidth)
    .action((rawValue: string, options: FormatOptions) => {
      runAction(() => {
        const value = parseUint256(rawValue);
        const { demo } = createCliContext();

        console.log(`Decimal: ${demo.valueToDecimalString(value)}`);
        console.log(`Hex: ${demo.valueToHexString(value)}`);
        if (options.width !== undefined) {
          console.log(
            `Hex (${options.width} digits): ${demo.valueToHexStringFixed(value, options.width)}`
          );
        }
      });
    });
}
