import {
  ChoicetapeError,
  ErrorCode,
  compareTapes,
  bytesToHex,
  floatToLex,
  isNegative,
  lexToFloat,
} from '@choicetape/core';

import { parseFloatArg, parseHexArg } from '../flags.js';

class RoundTripError extends ChoicetapeError {}

/** Lexicographic encoding of a float, checked by decoding it again. */
export function describeFloat(input: string): string[] {
  const value = parseFloatArg(input, 'float');
  const lex = floatToLex(value);
  const negative = isNegative(value);
  const magnitude = lexToFloat(lex);
  const decoded = negative ? -magnitude : magnitude;
  if (!Object.is(decoded, value)) {
    throw new RoundTripError({
      message: `${value} decoded as ${decoded}`,
      errorCode: ErrorCode.INTERNAL_ERROR,
      context: { value: input },
    });
  }
  return [
    `float: ${Object.is(value, -0) ? '-0' : String(value)}`,
    `lex: 0x${lex.toString(16).padStart(16, '0')}`,
    `sign: ${negative ? 1 : 0}`,
    'round-trip: ok',
  ];
}

/** Hex tapes ordered shortest first, then bytewise. */
export function sortTapes(inputs: readonly string[]): string[] {
  return inputs
    .map((hex, i) => parseHexArg(hex, `tape #${i + 1}`))
    .sort(compareTapes)
    .map(bytesToHex);
}
