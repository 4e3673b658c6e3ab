import { ConfigMutationError } from '../errors.js';
import type { ConfigMutation, ConfigValue, LiteralStyle } from './types.js';

const DEFAULT_LITERALS: LiteralStyle = {
  true: 'true',
  false: 'false',
  null: 'null',
};

const INLINE_WIDTH = 80;
const INDENT = '    ';

const CLOSERS: Record<string, string> = {
  '[': ']',
  '(': ')',
  '{': '}',
};

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_.]*$/;

type ValueSpan = {
  start: number;
  end: number;
};

function isRecord(
  value: ConfigValue,
): value is { readonly [key: string]: ConfigValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function renderValue(
  value: ConfigValue,
  literals: LiteralStyle = DEFAULT_LITERALS,
  eol = '\n',
  depth = 0,
): string {
  if (value === null) {
    return literals.null;
  }

  if (typeof value === 'boolean') {
    return value ? literals.true : literals.false;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ConfigMutationError(`Cannot write non-finite number ${value}`);
    }
    return String(value);
  }

  if (typeof value === 'string') {
    return JSON.stringify(value);
  }

  const entries = Array.isArray(value)
    ? value.map((item) => renderValue(item, literals, eol, depth + 1))
    : isRecord(value)
      ? Object.entries(value).map(
          ([key, item]) =>
            `${JSON.stringify(key)}: ${renderValue(item, literals, eol, depth + 1)}`,
        )
      : [];
  const [open, close] = Array.isArray(value)
    ? (['[', ']'] as const)
    : (['{', '}'] as const);

  if (entries.length === 0) {
    return `${open}${close}`;
  }

  const inline = `${open}${entries.join(', ')}${close}`;
  if (inline.length <= INLINE_WIDTH && !inline.includes('\n')) {
    return inline;
  }

  const pad = INDENT.repeat(depth);
  const lines = entries.map((entry) => `${pad}${INDENT}${entry}`);
  return `${open}${eol}${lines.join(`,${eol}`)}${eol}${pad}${close}`;
}

function scanString(content: string, start: number): number {
  const quote = content[start];
  if (quote === undefined) {
    return -1;
  }

  const fence = quote.repeat(3);
  if (content.startsWith(fence, start)) {
    const close = content.indexOf(fence, start + 3);
    return close === -1 ? -1 : close + 3;
  }

  for (let index = start + 1; index < content.length; index += 1) {
    const char = content[index];
    if (char === '\\') {
      index += 1;
      continue;
    }
    if (char === quote) {
      return index + 1;
    }
    if (char === '\n') {
      return -1;
    }
  }

  return -1;
}

function scanBracketed(content: string, start: number): number {
  const expected: string[] = [];

  for (let index = start; index < content.length; index += 1) {
    const char = content[index];
    if (char === undefined) {
      break;
    }

    if (char === '"' || char === "'") {
      const end = scanString(content, index);
      if (end === -1) {
        return -1;
      }
      index = end - 1;
      continue;
    }

    if (char === '#') {
      const newline = content.indexOf('\n', index);
      if (newline === -1) {
        return -1;
      }
      index = newline;
      continue;
    }

    const closer = CLOSERS[char];
    if (closer) {
      expected.push(closer);
      continue;
    }

    if (char === ']' || char === ')' || char === '}') {
      if (expected.pop() !== char) {
        return -1;
      }
      if (expected.length === 0) {
        return index + 1;
      }
    }
  }

  return -1;
}

function scanLineValue(content: string, start: number): number {
  const newline = content.indexOf('\n', start);
  let end = newline === -1 ? content.length : newline;

  const comment = content.indexOf('#', start);
  if (comment !== -1 && comment < end) {
    end = comment;
  }

  while (end > start && /\s/.test(content[end - 1] ?? '')) {
    end -= 1;
  }

  return end;
}

/**
 * Finds where an assignment's value ends: a bracketed value runs to its
 * matching closer (possibly many lines later), a quoted one to its closing
 * quote, anything else to the end of the line or a trailing comment.
 */
function scanValue(content: string, start: number, field: string): number {
  const first = content[start];
  let end: number;

  if (first !== undefined && Object.hasOwn(CLOSERS, first)) {
    end = scanBracketed(content, start);
  } else if (first === '"' || first === "'") {
    end = scanString(content, start);
  } else {
    end = scanLineValue(content, start);
  }

  if (end === -1) {
    throw new ConfigMutationError(
      `Cannot find the end of the value assigned to ${field}`,
      { field },
    );
  }

  return end;
}

export function findFieldSpans(content: string, field: string): ValueSpan[] {
  const assignment = new RegExp(
    `^${escapeRegExp(field)}[ \\t]*(?::[^=\\n]*)?=(?!=)[ \\t]*`,
    'gm',
  );
  const spans: ValueSpan[] = [];
  let consumed = 0;

  for (const match of content.matchAll(assignment)) {
    const matchStart = match.index ?? 0;
    if (matchStart < consumed) {
      continue;
    }

    const start = matchStart + match[0].length;
    const end = scanValue(content, start, field);
    spans.push({ start, end });
    consumed = end;
  }

  return spans;
}

export function substituteField(
  content: string,
  field: string,
  value: ConfigValue,
  literals: LiteralStyle = DEFAULT_LITERALS,
): string {
  if (!FIELD_NAME.test(field)) {
    throw new ConfigMutationError(`Invalid configuration field name: ${field}`, {
      field,
    });
  }

  const eol = content.includes('\r\n') ? '\r\n' : '\n';
  const rendered = renderValue(value, literals, eol);
  const spans = findFieldSpans(content, field);

  if (spans.length === 0) {
    const separator = content.length === 0 || content.endsWith('\n') ? '' : eol;
    return `${content}${separator}${field} = ${rendered}${eol}`;
  }

  let output = content;
  for (const span of [...spans].reverse()) {
    output = output.slice(0, span.start) + rendered + output.slice(span.end);
  }

  return output;
}

export function applyMutations(
  content: string,
  mutations: readonly ConfigMutation[],
  literals: LiteralStyle = DEFAULT_LITERALS,
): string {
  return mutations.reduce(
    (current, mutation) =>
      substituteField(current, mutation.field, mutation.value, literals),
    content,
  );
}

export { DEFAULT_LITERALS };
export type { ValueSpan };
