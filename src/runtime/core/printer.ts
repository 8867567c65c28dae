/**
 * Value Printer
 *
 * Renders values as text. Strings print raw at the top level and quoted
 * with C-style escapes once nested inside a container. Containers that are
 * already being printed further up the current path print as [...] or
 * {...}, so cyclic structures terminate.
 */

import { InternalError, invariant } from '../../error-classes.js';
import { stringBytes, stringText } from './scalars.js';
import {
  currentKind,
  kindName,
  OBJECT_KINDS,
  type TallowDict,
  type TallowList,
  type TallowObject,
} from './values.js';

/** Destination for printed text */
export interface PrintSink {
  write(text: string): void;
}

const NAMED_ESCAPES: ReadonlyMap<number, string> = new Map([
  [0x0d, '\\r'],
  [0x0a, '\\n'],
  [0x0b, '\\v'],
  [0x09, '\\t'],
  [0x0c, '\\f'],
  [0x08, '\\b'],
  [0x07, '\\a'],
  [0x5c, '\\\\'],
  [0x22, '\\"'],
]);

/** Quote a byte string with C-style escapes */
export function quoteBytes(bytes: Uint8Array): string {
  if (bytes.length === 0) return '""';

  let result = '"';
  for (const byte of bytes) {
    const named = NAMED_ESCAPES.get(byte);
    if (named !== undefined) {
      result += named;
    } else if (byte < 0x20 || byte >= 0x80) {
      result += `\\x${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    } else {
      result += String.fromCharCode(byte);
    }
  }
  return result + '"';
}

function indent(depth: number): string {
  return '\n' + ' '.repeat(depth + 1);
}

/**
 * Print a value at the given recursion depth. An absent value (a list
 * hole) prints as 0.
 */
export function printObject(
  sink: PrintSink,
  value: TallowObject | undefined,
  depth = 0
): void {
  printNested(sink, value, depth, new Set());
}

/** Print a value into a string */
export function formatObject(
  value: TallowObject | undefined,
  depth = 0
): string {
  let text = '';
  const collector: PrintSink = {
    write: (chunk) => {
      text += chunk;
    },
  };
  printObject(collector, value, depth);
  return text;
}

function printNested(
  sink: PrintSink,
  value: TallowObject | undefined,
  depth: number,
  visiting: Set<TallowObject>
): void {
  if (value === undefined) {
    sink.write('0');
    return;
  }

  switch (value.kind) {
    case OBJECT_KINDS.NULL:
      sink.write('null');
      return;

    case OBJECT_KINDS.INTEGER:
      sink.write(value.value.toString());
      return;

    case OBJECT_KINDS.STRING:
      sink.write(depth === 0 ? stringText(value) : quoteBytes(stringBytes(value)));
      return;

    case OBJECT_KINDS.LIST:
      if (visiting.has(value)) {
        sink.write('[...]');
        return;
      }
      visiting.add(value);
      try {
        printList(sink, value, depth, visiting);
      } finally {
        visiting.delete(value);
      }
      return;

    case OBJECT_KINDS.DICT:
      if (visiting.has(value)) {
        sink.write('{...}');
        return;
      }
      visiting.add(value);
      try {
        printDict(sink, value, depth, visiting);
      } finally {
        visiting.delete(value);
      }
      return;

    case OBJECT_KINDS.FUNCTION: {
      const body = value.body;
      invariant(body !== undefined, 'TALLOW-I002', {
        operation: 'printObject',
      });
      const id = value.runtime.handleId(body);
      sink.write(`Function at 0x${id.toString(16).padStart(8, '0')}`);
      return;
    }
  }

  throw new InternalError('TALLOW-I002', {
    operation: `printObject(${kindName(currentKind(value))})`,
  });
}

function printList(
  sink: PrintSink,
  list: TallowList,
  depth: number,
  visiting: Set<TallowObject>
): void {
  const count = list.slots.length;
  const wrap = count >= list.runtime.print.wrapThreshold;

  sink.write('[');
  for (let i = 0; i < count; i++) {
    printNested(sink, list.slots[i], depth + 1, visiting);
    if (i < count - 1) {
      sink.write(', ');
      if (wrap) {
        sink.write(indent(depth));
      }
    }
  }
  sink.write(']');
}

function printDict(
  sink: PrintSink,
  dict: TallowDict,
  depth: number,
  visiting: Set<TallowObject>
): void {
  sink.write('{');
  dict.entries.forEach((entry, i) => {
    if (i > 0) {
      sink.write(indent(depth));
    }
    printNested(sink, entry.key, depth + 1, visiting);
    sink.write(' : ');
    printNested(sink, entry.value, depth + 1, visiting);
  });
  sink.write('}');
}
