import { Command } from 'commander';
import { parseUint256 } from '@uint256-strings/core';
import { createCliContext, runAction } from '../context.js';

export function createDisplayCommand(): Command {
  return new Command('display')
    .description('Print a value in every supported notation')
    .argument('<value>', 'Decimal or 0x-prefixed hex value')
    .action((rawValue: string) => {
      runAction(() => {
        const value = parseUint256(rawValue);
        const { demo } = createCliContext();

        console.log(demo.multiFormatDisplay(value));
      });
    });
}
