import pad from 'lodash/padStart';

/** Document information entries, strings are written as PDF text strings. */
export interface Metadata {
  Title?: string;
  Author?: string;
  Subject?: string;
  Keywords?: string;
  Creator?: string;
  Producer?: string;
  CreationDate?: Date;
  ModDate?: Date;
}

/** An indirect object, `data` is either a PDF value or its serialized form. */
export interface PdfObject {
  num: number;
  data?: PdfValue;
  stream?: Uint8Array | string;
}

export class PdfRef {
  readonly objNum: number;

  constructor(objNum: number) {
    this.objNum = objNum;
  }
}

export type PdfPrimitive =
  | string
  | number
  | boolean
  | Uint8Array
  | null
  | Date
  | PdfRef;
export interface PdfDictionary {
  [member: string]: PdfPrimitive | PdfArray | PdfDictionary;
}
export type PdfArray = Array<PdfPrimitive | PdfArray | PdfDictionary>;
export type PdfValue = PdfPrimitive | PdfDictionary | PdfArray | null;

export function makeRef(target: number | PdfObject): PdfRef {
  return new PdfRef(typeof target === 'number' ? target : target.num);
}

export function isPdfDictionary(
  value: PdfValue | undefined
): value is PdfDictionary {
  return Object.prototype.toString.call(value) === '[object Object]';
}

// Nested dictionaries are indented by this many spaces per level
const INDENT = '  ';

/** Encode a string as UTF-16BE with a byte order mark, as required for PDF
 *  text strings outside of PDFDocEncoding. */
export function toUTF16BE(str: string): Uint8Array {
  const out = new Uint8Array(2 + 2 * str.length);
  const view = new DataView(out.buffer);
  view.setUint16(0, 0xfeff);
  for (let i = 0; i < str.length; i++) {
    view.setUint16(2 + 2 * i, str.charCodeAt(i));
  }
  return out;
}

function hexString(data: Uint8Array): string {
  let hex = '';
  for (const byte of data) {
    hex += pad(byte.toString(16), 2, '0');
  }
  return `<${hex.toUpperCase()}>`;
}

function pdfDate(date: Date): string {
  const fields = [
    date.getUTCMonth() + 1,
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  ];
  const year = pad(date.getUTCFullYear().toString(10), 4, '0');
  return `(D:${year}${fields.map((f) => pad(f.toString(10), 2, '0')).join('')}Z)`;
}

function pdfNumber(num: number): string {
  if (!(Math.abs(num) < 1e21)) {
    throw new Error(`unsupported number: ${num}`);
  }
  // Six decimal places are more than any PDF consumer resolves
  return (Math.round(num * 1e6) / 1e6).toString(10);
}

/** Serialize a value to its PDF syntax.
 *
 * Strings are written as given, so names must carry their leading slash and
 * literal strings their parentheses. A literal string with non-ASCII
 * characters is turned into a UTF-16 hex string.
 */
export function serialize(value: PdfValue, depth = 0): string {
  if (typeof value === 'string') {
    const isLiteral = value.startsWith('(') && value.endsWith(')');
    if (isLiteral && /[^\x00-\x7f]/.test(value)) {
      return hexString(toUTF16BE(value.slice(1, -1)));
    }
    return value;
  }
  if (typeof value === 'number') {
    return pdfNumber(value);
  }
  if (value instanceof Uint8Array) {
    return hexString(value);
  }
  if (value instanceof Date) {
    return pdfDate(value);
  }
  if (value instanceof PdfRef) {
    return `${value.objNum} 0 R`;
  }
  if (Array.isArray(value)) {
    return `[${value.map((v) => serialize(v, depth + 1)).join(' ')}]`;
  }
  if (isPdfDictionary(value)) {
    const indent = INDENT.repeat(depth);
    const entries = Object.entries(value).map(
      ([key, v]) => `${indent}${INDENT}/${key} ${serialize(v, depth + 1)}`
    );
    return ['<<', ...entries, `${indent}>>`].join('\n');
  }
  return String(value);
}
