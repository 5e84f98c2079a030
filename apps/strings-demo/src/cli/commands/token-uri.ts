import { Command } from 'commander';
import { parseUint256 } from '@uint256-strings/core';
import { createCliContext, runAction } from '../context.js';

export function createTokenUriCommand(): Command {
  return new Command('token-uri')
    .description('Print the metadata URI for a token id')
    .argument('<tokenId>', 'Decimal or 0x-prefixed hex token id')
    .action((rawTokenId: string) => {
      runAction(() => {
        const tokenId = parseUint256(rawTokenId);
        const { demo } = createCliContext();

        console.log(demo.generateTokenUri(tokenId));
      });
    });
}
