import type { FloatConstraints } from '../codec/floats.js';
import { floatPermitted, floatToInt } from '../codec/floats.js';
import type { IntervalSet } from '../codec/intervals.js';
import { bytesToHex } from '../util/bytes.js';

export interface IntegerConstraints {
  min: number | null;
  max: number | null;
  /** value -> probability; the remaining mass draws normally */
  weights: ReadonlyMap<number, number> | null;
  shrinkTowards: number;
}

export interface BooleanConstraints {
  p: number;
}

export interface StringConstraints {
  intervals: IntervalSet;
  minSize: number;
  maxSize: number;
}

export interface BytesConstraints {
  minSize: number;
  maxSize: number;
}

export type { FloatConstraints };

interface NodeBase {
  wasForced: boolean;
  /** tape offsets [start, end) of the bytes this draw consumed */
  start: number;
  end: number;
}

interface ChoiceSpec {
  integer: { value: number; constraints: IntegerConstraints };
  boolean: { value: boolean; constraints: BooleanConstraints };
  float: { value: number; constraints: FloatConstraints };
  string: { value: string; constraints: StringConstraints };
  bytes: { value: Uint8Array; constraints: BytesConstraints };
}

/** A kind of draw together with its constraints. */
export type ChoiceKind = {
  [K in keyof ChoiceSpec]: { type: K; constraints: ChoiceSpec[K]['constraints'] };
}[keyof ChoiceSpec];

export type ChoiceNode = {
  [K in keyof ChoiceSpec]: NodeBase & {
    type: K;
    value: ChoiceSpec[K]['value'];
    constraints: ChoiceSpec[K]['constraints'];
  };
}[keyof ChoiceSpec];

export type ChoiceType = ChoiceNode['type'];
export type ChoiceValue = ChoiceNode['value'];

/** Replay a choice by value, or ask for the simplest permitted values. */
export interface ChoiceTemplate {
  type: 'simplest';
  /** number of draws the template covers; null means all remaining */
  count: number | null;
}

export type ChoiceInput = ChoiceValue | ChoiceTemplate;

export function isChoiceTemplate(input: ChoiceInput): input is ChoiceTemplate {
  return (
    typeof input === 'object' &&
    !(input instanceof Uint8Array) &&
    input.type === 'simplest'
  );
}

function codePointLength(s: string): number {
  let n = 0;
  for (const _ of s) n++;
  return n;
}

export function choicePermitted(kind: ChoiceKind, value: ChoiceValue): boolean {
  switch (kind.type) {
    case 'integer': {
      if (typeof value !== 'number' || !Number.isSafeInteger(value)) return false;
      const { min, max } = kind.constraints;
      return (min === null || value >= min) && (max === null || value <= max);
    }
    case 'boolean': {
      if (typeof value !== 'boolean') return false;
      const { p } = kind.constraints;
      return value ? p > 0 : p < 1;
    }
    case 'float':
      return typeof value === 'number' && floatPermitted(value, kind.constraints);
    case 'string': {
      if (typeof value !== 'string') return false;
      const { intervals, minSize, maxSize } = kind.constraints;
      const size = codePointLength(value);
      if (size < minSize || size > maxSize) return false;
      for (const ch of value) {
        if (!intervals.has(ch.codePointAt(0) ?? -1)) return false;
      }
      return true;
    }
    case 'bytes': {
      if (!(value instanceof Uint8Array)) return false;
      const { minSize, maxSize } = kind.constraints;
      return value.length >= minSize && value.length <= maxSize;
    }
  }
}

/** Stable text key for a choice value; distinguishes -0.0 and NaN. */
export function choiceKey(value: ChoiceValue): string {
  if (typeof value === 'boolean') return value ? 'b:1' : 'b:0';
  if (typeof value === 'string') return `s:${JSON.stringify(value)}`;
  if (value instanceof Uint8Array) return `y:${bytesToHex(value)}`;
  if (Number.isInteger(value) && !Object.is(value, -0)) return `i:${value}`;
  return `f:${floatToInt(value).toString(16)}`;
}

export function choicesKey(values: readonly ChoiceValue[]): string {
  return values.map(choiceKey).join('|');
}

export function choiceToString(node: ChoiceNode): string {
  switch (node.type) {
    case 'bytes':
      return `bytes(${bytesToHex(node.value)})`;
    case 'string':
      return `string(${JSON.stringify(node.value)})`;
    case 'float':
      return `float(${Object.is(node.value, -0) ? '-0.0' : String(node.value)})`;
    default:
      return `${node.type}(${String(node.value)})`;
  }
}
