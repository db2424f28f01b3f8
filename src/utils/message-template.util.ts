import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';
import type { FormatProvider } from '../types/log-event.types.js';

dayjs.extend(utc);
dayjs.extend(timezone);

const MAX_DEPTH = 5;
const DEFAULT_LOCALE = 'en-US';
const ISO_FORMAT = 'YYYY-MM-DDTHH:mm:ss.SSSZ';
const PROPERTY_NAME = /^[A-Za-z0-9_]+$/;
const ALIGNMENT = /^-?\d+$/;
const STANDARD_NUMBER_FORMAT = /^([FfNnPpDdXx])(\d{1,2})?$/;
const CUSTOM_NUMBER_FORMAT = /^[0#,]*(\.[0#]+)?$/;

export type CaptureHint = 'default' | 'destructure' | 'stringify';

export type TemplateToken =
  | { kind: 'text'; text: string }
  | {
      kind: 'property';
      raw: string;
      name: string;
      capture: CaptureHint;
      alignment?: number;
      format?: string;
    };

function parsePropertyToken(raw: string): TemplateToken | null {
  let content = raw.slice(1, -1);
  let capture: CaptureHint = 'default';

  if (content.startsWith('@')) {
    capture = 'destructure';
    content = content.slice(1);
  } else if (content.startsWith('$')) {
    capture = 'stringify';
    content = content.slice(1);
  }

  let format: string | undefined;
  const formatIndex = content.indexOf(':');
  if (formatIndex !== -1) {
    format = content.slice(formatIndex + 1);
    content = content.slice(0, formatIndex);
  }

  let alignment: number | undefined;
  const alignmentIndex = content.indexOf(',');
  if (alignmentIndex !== -1) {
    const alignmentText = content.slice(alignmentIndex + 1);
    if (!ALIGNMENT.test(alignmentText)) {
      return null;
    }
    alignment = Number(alignmentText);
    content = content.slice(0, alignmentIndex);
  }

  if (!PROPERTY_NAME.test(content)) {
    return null;
  }

  return { kind: 'property', raw, name: content, capture, alignment, format };
}

/**
 * Split a message template into text and property tokens.
 *
 * `{{` and `}}` are literal braces. Anything that does not parse as a
 * property token is kept as text.
 */
export function parseMessageTemplate(template: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  let text = '';
  let i = 0;

  const pushText = (): void => {
    if (text.length > 0) {
      tokens.push({ kind: 'text', text });
      text = '';
    }
  };

  while (i < template.length) {
    const ch = template[i];

    if (ch === '{') {
      if (template[i + 1] === '{') {
        text += '{';
        i += 2;
        continue;
      }

      const end = template.indexOf('}', i + 1);
      if (end === -1) {
        text += template.slice(i);
        break;
      }

      const raw = template.slice(i, end + 1);
      if (raw.indexOf('{', 1) !== -1) {
        text += ch;
        i += 1;
        continue;
      }

      const token = parsePropertyToken(raw);
      if (token) {
        pushText();
        tokens.push(token);
      } else {
        text += raw;
      }
      i = end + 1;
      continue;
    }

    if (ch === '}' && template[i + 1] === '}') {
      text += '}';
      i += 2;
      continue;
    }

    text += ch;
    i += 1;
  }

  pushText();
  return tokens;
}

function safeString(value: unknown): string {
  try {
    return String(value);
  } catch {
    return '[unrenderable]';
  }
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function pad(value: string, alignment: number | undefined): string {
  if (alignment === undefined) {
    return value;
  }
  const width = Math.abs(alignment);
  return alignment < 0 ? value.padEnd(width) : value.padStart(width);
}

function formatInteger(value: number, radix: number, digits: number | undefined): string {
  const truncated = Math.trunc(value);
  const body = Math.abs(truncated).toString(radix).padStart(digits ?? 0, '0');
  return truncated < 0 ? `-${body}` : body;
}

export function formatNumber(value: number, format: string | undefined, formatProvider: FormatProvider): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }

  const locale = formatProvider.locale ?? DEFAULT_LOCALE;

  if (format) {
    const standard = STANDARD_NUMBER_FORMAT.exec(format);
    if (standard) {
      const specifier = standard[1];
      const digits = standard[2] === undefined ? undefined : Number(standard[2]);
      switch (specifier) {
        case 'F':
        case 'f':
          return new Intl.NumberFormat(locale, {
            useGrouping: false,
            minimumFractionDigits: digits ?? 2,
            maximumFractionDigits: digits ?? 2,
          }).format(value);
        case 'N':
        case 'n':
          return new Intl.NumberFormat(locale, {
            useGrouping: true,
            minimumFractionDigits: digits ?? 2,
            maximumFractionDigits: digits ?? 2,
          }).format(value);
        case 'P':
        case 'p':
          return new Intl.NumberFormat(locale, {
            style: 'percent',
            minimumFractionDigits: digits ?? 2,
            maximumFractionDigits: digits ?? 2,
          }).format(value);
        case 'D':
        case 'd':
          return formatInteger(value, 10, digits);
        case 'X':
          return formatInteger(value, 16, digits).toUpperCase();
        case 'x':
          return formatInteger(value, 16, digits);
      }
    }

    if (CUSTOM_NUMBER_FORMAT.test(format) && /[0#]/.test(format)) {
      const [integerPart = '', fractionPart = ''] = format.split('.');
      const fraction = fractionPart.replace(/[^0#]/g, '');
      const integerZeros = (integerPart.match(/0/g) ?? []).length;
      return new Intl.NumberFormat(locale, {
        useGrouping: integerPart.includes(','),
        minimumIntegerDigits: Math.min(Math.max(integerZeros, 1), 21),
        minimumFractionDigits: (fraction.match(/0/g) ?? []).length,
        maximumFractionDigits: fraction.length,
      }).format(value);
    }
  }

  if (formatProvider.locale) {
    return new Intl.NumberFormat(formatProvider.locale, {
      useGrouping: false,
      maximumFractionDigits: 20,
    }).format(value);
  }
  return String(value);
}

/**
 * Convert to the given IANA zone. Unknown zones fall back to UTC.
 */
export function inTimeZone(value: Date, timeZone: string | undefined): dayjs.Dayjs {
  if (timeZone) {
    try {
      return dayjs(value).tz(timeZone);
    } catch {
      // dayjs throws a RangeError for zones Intl does not know
    }
  }
  return dayjs(value).utc();
}

export function formatDate(value: Date, format: string | undefined, formatProvider: FormatProvider): string {
  if (Number.isNaN(value.getTime())) {
    return 'Invalid Date';
  }
  return inTimeZone(value, formatProvider.timeZone).format(format && format !== 'l' ? format : ISO_FORMAT);
}

function typeTag(value: object): string | undefined {
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) {
    return undefined;
  }
  const name = value.constructor?.name;
  return name && name !== 'Object' ? name : undefined;
}

function renderValue(
  value: unknown,
  format: string | undefined,
  formatProvider: FormatProvider,
  depth: number,
  seen: WeakSet<object>
): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  switch (typeof value) {
    case 'string':
      return format === 'l' ? value : quote(value);
    case 'number':
      return formatNumber(value, format, formatProvider);
    case 'bigint':
      return value.toString();
    case 'boolean':
      return String(value);
    case 'symbol':
      return value.toString();
    case 'function':
      return `[Function${value.name ? ` ${value.name}` : ''}]`;
  }

  if (value instanceof Date) {
    return formatDate(value, format, formatProvider);
  }

  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }

  if (typeof value !== 'object') {
    return safeString(value);
  }

  if (seen.has(value)) {
    return '[Circular]';
  }
  if (depth >= MAX_DEPTH) {
    return '...';
  }

  seen.add(value);
  try {
    const renderNested = (nested: unknown): string =>
      renderValue(nested, undefined, formatProvider, depth + 1, seen);

    if (Array.isArray(value) || value instanceof Set) {
      return `[${Array.from(value, renderNested).join(', ')}]`;
    }

    const entries: Array<[string, unknown]> =
      value instanceof Map
        ? Array.from(value.entries(), ([key, nested]): [string, unknown] => [safeString(key), nested])
        : Object.entries(value);

    const tag = typeTag(value);
    const body =
      entries.length === 0 ? '{}' : `{ ${entries.map(([key, nested]) => `${key}: ${renderNested(nested)}`).join(', ')} }`;
    return tag && !(value instanceof Map) ? `${tag} ${body}` : body;
  } finally {
    seen.delete(value);
  }
}

/**
 * Render a single property value the way it appears inside a rendered
 * message. Never throws: values that cannot be rendered fall back to
 * `String(value)`.
 */
export function renderTemplateValue(
  value: unknown,
  format: string | undefined,
  formatProvider: FormatProvider,
  capture: CaptureHint = 'default'
): string {
  try {
    if (capture === 'stringify') {
      const text = safeString(value);
      return format === 'l' ? text : quote(text);
    }
    return renderValue(value, format, formatProvider, 0, new WeakSet<object>());
  } catch {
    return safeString(value);
  }
}

/**
 * Render a property value for display outside of a message (attachment
 * fields): top-level strings are not quoted.
 */
export function renderPropertyValue(value: unknown, formatProvider: FormatProvider): string {
  return renderTemplateValue(value, 'l', formatProvider);
}

export function renderMessageTemplate(
  template: string,
  properties: Readonly<Record<string, unknown>>,
  formatProvider: FormatProvider = {}
): string {
  return parseMessageTemplate(template)
    .map(token => {
      if (token.kind === 'text') {
        return token.text;
      }
      if (!Object.prototype.hasOwnProperty.call(properties, token.name)) {
        return token.raw;
      }
      const rendered = renderTemplateValue(properties[token.name], token.format, formatProvider, token.capture);
      return pad(rendered, token.alignment);
    })
    .join('');
}
