/**
 * Strings Demo
 *
 * Thin facade over @uint256-strings/core showing how contract-side string
 * helpers are typically used: plain conversions, NFT-style token URIs and a
 * side-by-side display of one value in every notation.
 */

import type { pino } from 'pino';
import {
  toDecimalString,
  toHexString,
  toHexStringFixed,
} from '@uint256-strings/core';
import {
  DEFAULT_TOKEN_URI_BASE,
  DEFAULT_TOKEN_URI_HEX_WIDTH,
  type StringsDemoConfig,
} from './config.js';
import { createLogger } from './lib/logger.js';

export interface StringsDemoOptions {
  /** Base URL for token URIs (trailing slash optional) */
  tokenUriBase?: string;

  /** Minimum hex digits of the `hex=` query value */
  tokenUriHexWidth?: number;

  /** Logger; defaults to a `StringsDemo` child of the root logger */
  logger?: pino.Logger;
}

export class StringsDemo {
  private readonly logger: pino.Logger;
  private readonly tokenUriBase: string;
  private readonly tokenUriHexWidth: number;

  constructor(options: StringsDemoOptions = {}) {
    this.logger = options.logger ?? createLogger('StringsDemo');
    this.tokenUriBase = (options.tokenUriBase ?? DEFAULT_TOKEN_URI_BASE).replace(/\/+$/, '');
    this.tokenUriHexWidth = options.tokenUriHexWidth ?? DEFAULT_TOKEN_URI_HEX_WIDTH;
  }

  static fromConfig(config: StringsDemoConfig, logger?: pino.Logger): StringsDemo {
    return new StringsDemo({
      tokenUriBase: config.tokenUriBase,
      tokenUriHexWidth: config.tokenUriHexWidth,
      logger,
    });
  }

  valueToDecimalString(value: bigint): string {
    return this.traced('valueToDecimalString', { value: String(value) }, () =>
      toDecimalString(value)
    );
  }

  valueToHexString(value: bigint): string {
    return this.traced('valueToHexString', { value: String(value) }, () =>
      toHexString(value)
    );
  }

  valueToHexStringFixed(value: bigint, length: number): string {
    return this.traced('valueToHexStringFixed', { value: String(value), length }, () =>
      toHexStringFixed(value, length)
    );
  }

  /**
   * Build a token metadata URI carrying both the decimal and hex id
   *
   * @example
   * new StringsDemo().generateTokenUri(42n);
   * // 'https://api.example.com/token/42/metadata?hex=0x0000002a'
   */
  generateTokenUri(tokenId: bigint): string {
    return this.traced('generateTokenUri', { tokenId: String(tokenId) }, () => {
      const decimalId = toDecimalString(tokenId);
      const hexId = toHexStringFixed(tokenId, this.tokenUriHexWidth);
      return `${this.tokenUriBase}/${decimalId}/metadata?hex=${hexId}`;
    });
  }

  /**
   * Render one value in every supported notation, one per line
   */
  multiFormatDisplay(value: bigint): string {
    return this.traced('multiFormatDisplay', { value: String(value) }, () =>
      [
        'Value representations:',
        `Decimal: ${toDecimalString(value)}`,
        `Hex: ${toHexString(value)}`,
        `Hex (8 chars): ${toHexStringFixed(value, 8)}`,
        `Hex (16 chars): ${toHexStringFixed(value, 16)}`,
      ].join('\n')
    );
  }

  /**
   * Run one formatting call, logging its input and output at debug level
   * and any rejection at error level before rethrowing
   */
  private traced(
    operation: string,
    input: Record<string, string | number>,
    format: () => string
  ): string {
    this.logger.debug({ operation, ...input }, 'Formatting uint256');

    try {
      const output = format();
      this.logger.debug({ operation, output, outputLength: output.length }, 'Formatted uint256');
      return output;
    } catch (error) {
      this.logger.error(
        {
          operation,
          ...input,
          errorName: error instanceof Error ? error.name : typeof error,
          error: error instanceof Error ? error.message : String(error),
        },
        'Formatting failed'
      );
      throw error;
    }
  }
}
