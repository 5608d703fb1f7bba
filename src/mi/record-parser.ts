/**
 * GDB/MI Record Parser
 *
 * Parses the line-oriented GDB/MI output format:
 *   [token]^class[,results]     result record (reply to a command)
 *   [token]*class[,results]     exec async record
 *   [token]+class[,results]     status async record
 *   [token]=class[,results]     notify async record
 *   ~"text" @"text" &"text"     console / target / log stream records
 *   (gdb)                       prompt
 * Anything else on stdout was written by the debuggee itself.
 */

export interface MiTuple {
  [name: string]: MiValue;
}

export type MiValue = string | MiTuple | MiValue[];

export type ResultClass = 'done' | 'running' | 'connected' | 'error' | 'exit';
export type AsyncKind = 'exec' | 'status' | 'notify';
export type StreamKind = 'console' | 'target' | 'log';

export interface MiResultRecord {
  kind: 'result';
  token?: number;
  resultClass: ResultClass;
  results: MiTuple;
  raw: string;
}

export interface MiAsyncRecord {
  kind: AsyncKind;
  token?: number;
  asyncClass: string;
  results: MiTuple;
  raw: string;
}

export interface MiStreamRecord {
  kind: StreamKind;
  text: string;
  raw: string;
}

export interface MiPromptRecord {
  kind: 'prompt';
  raw: string;
}

/** A line that is not MI syntax, i.e. output of the program being debugged */
export interface MiProgramOutput {
  kind: 'program';
  text: string;
  raw: string;
}

/** A line that looked like MI but could not be parsed */
export interface MiMalformedRecord {
  kind: 'malformed';
  error: string;
  raw: string;
}

export type MiRecord =
  | MiResultRecord
  | MiAsyncRecord
  | MiStreamRecord
  | MiPromptRecord
  | MiProgramOutput
  | MiMalformedRecord;

const RESULT_CLASSES: readonly ResultClass[] = ['done', 'running', 'connected', 'error', 'exit'];

function isResultClass(value: string): value is ResultClass {
  return RESULT_CLASSES.some((resultClass) => resultClass === value);
}

const ASYNC_SIGILS: Record<string, AsyncKind> = {
  '*': 'exec',
  '+': 'status',
  '=': 'notify'
};

const STREAM_SIGILS: Record<string, StreamKind> = {
  '~': 'console',
  '@': 'target',
  '&': 'log'
};

const NEWLINE = 0x0a;

export class MiRecordParser {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Add data to the internal buffer
   */
  append(data: string | Buffer): void {
    const chunk = Buffer.isBuffer(data) ? data : Buffer.from(data, 'utf8');
    this.buffer = Buffer.concat([this.buffer, chunk]);
  }

  /**
   * Parse every complete line in the buffer, leaving a trailing partial line
   */
  parseAll(): MiRecord[] {
    const records: MiRecord[] = [];
    let newline: number;

    while ((newline = this.buffer.indexOf(NEWLINE)) !== -1) {
      const line = this.buffer.subarray(0, newline).toString('utf8');
      this.buffer = this.buffer.subarray(newline + 1);

      const record = parseRecord(line);
      if (record) {
        records.push(record);
      }
    }

    return records;
  }

  /**
   * Flush a trailing line that never got its newline (stream closed)
   */
  flush(): MiRecord[] {
    if (this.buffer.length === 0) {
      return [];
    }
    const line = this.buffer.toString('utf8');
    this.buffer = Buffer.alloc(0);
    const record = parseRecord(line);
    return record ? [record] : [];
  }

  hasBufferedData(): boolean {
    return this.buffer.length > 0;
  }

  clear(): void {
    this.buffer = Buffer.alloc(0);
  }
}

/**
 * Parse one output line. Returns null for blank lines.
 */
export function parseRecord(rawLine: string): MiRecord | null {
  const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
  if (line.trim().length === 0) {
    return null;
  }

  if (line.trimEnd() === '(gdb)') {
    return { kind: 'prompt', raw: line };
  }

  const streamKind = STREAM_SIGILS[line[0]];
  if (streamKind && line[1] === '"') {
    try {
      const cursor = new Cursor(line, 1);
      return { kind: streamKind, text: cursor.readCString(), raw: line };
    } catch (error) {
      return malformed(line, error);
    }
  }

  const match = /^(\d*)([\^*+=])([a-zA-Z][\w-]*)(.*)$/.exec(line);
  if (!match) {
    return { kind: 'program', text: line, raw: line };
  }

  const [, tokenText, sigil, className, rest] = match;
  const token = tokenText.length > 0 ? Number.parseInt(tokenText, 10) : undefined;

  if (rest.length > 0 && rest[0] !== ',') {
    return { kind: 'program', text: line, raw: line };
  }

  let results: MiTuple;
  try {
    results = rest.length > 0 ? new Cursor(rest, 1).readResults() : {};
  } catch (error) {
    return malformed(line, error);
  }

  if (sigil === '^') {
    if (!isResultClass(className)) {
      return { kind: 'program', text: line, raw: line };
    }
    return { kind: 'result', token, resultClass: className, results, raw: line };
  }

  return {
    kind: ASYNC_SIGILS[sigil],
    token,
    asyncClass: className,
    results,
    raw: line
  };
}

function malformed(line: string, error: unknown): MiMalformedRecord {
  return {
    kind: 'malformed',
    error: error instanceof Error ? error.message : String(error),
    raw: line
  };
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  f: '\f',
  v: '\v',
  b: '\b',
  a: '\x07',
  e: '\x1b',
  '"': '"',
  '\\': '\\'
};

/**
 * Recursive-descent reader over the MI results grammar
 */
class Cursor {
  constructor(
    private readonly text: string,
    private pos: number = 0
  ) {}

  readResults(): MiTuple {
    const results: MiTuple = {};
    for (;;) {
      const [name, value] = this.readResult();
      if (!Object.hasOwn(results, name)) {
        results[name] = value;
      }
      if (this.pos >= this.text.length) {
        return results;
      }
      this.expect(',');
    }
  }

  /**
   * Octal escapes are raw bytes; consecutive ones are decoded together as
   * UTF-8 so multi-byte characters survive a non-UTF-8 GDB charset.
   */
  readCString(): string {
    this.expect('"');
    let out = '';
    let bytes: number[] = [];
    const flushBytes = () => {
      if (bytes.length > 0) {
        out += Buffer.from(bytes).toString('utf8');
        bytes = [];
      }
    };

    while (this.pos < this.text.length) {
      const ch = this.text[this.pos++];
      if (ch === '"') {
        flushBytes();
        return out;
      }
      if (ch !== '\\') {
        flushBytes();
        out += ch;
        continue;
      }
      const next = this.text[this.pos++];
      if (next === undefined) {
        break;
      }
      if (next >= '0' && next <= '7') {
        let digits = next;
        while (digits.length < 3 && /[0-7]/.test(this.text[this.pos] ?? '')) {
          digits += this.text[this.pos++];
        }
        bytes.push(Number.parseInt(digits, 8) & 0xff);
      } else {
        flushBytes();
        out += SIMPLE_ESCAPES[next] ?? next;
      }
    }
    throw new Error(`Unterminated string at offset ${this.pos}`);
  }

  private readResult(): [string, MiValue] {
    const equals = this.text.indexOf('=', this.pos);
    if (equals === -1) {
      throw new Error(`Expected '=' after offset ${this.pos}`);
    }
    const name = this.text.slice(this.pos, equals);
    if (!/^[\w-]+$/.test(name)) {
      throw new Error(`Invalid variable name '${name}' at offset ${this.pos}`);
    }
    this.pos = equals + 1;
    return [name, this.readValue()];
  }

  private readValue(): MiValue {
    switch (this.peek()) {
      case '"':
        return this.readCString();
      case '{':
        return this.readTuple();
      case '[':
        return this.readList();
      default:
        throw new Error(`Unexpected '${this.peek() ?? 'end of line'}' at offset ${this.pos}`);
    }
  }

  private readTuple(): MiTuple {
    this.expect('{');
    const tuple: MiTuple = {};
    if (this.peek() === '}') {
      this.pos++;
      return tuple;
    }
    for (;;) {
      const [name, value] = this.readResult();
      if (!Object.hasOwn(tuple, name)) {
        tuple[name] = value;
      }
      if (this.peek() === '}') {
        this.pos++;
        return tuple;
      }
      this.expect(',');
    }
  }

  /**
   * Lists hold either bare values or named results; names are dropped
   * (`stack=[frame={...},frame={...}]` becomes an array of tuples).
   */
  private readList(): MiValue[] {
    this.expect('[');
    const list: MiValue[] = [];
    if (this.peek() === ']') {
      this.pos++;
      return list;
    }
    for (;;) {
      const next = this.peek();
      list.push(next === '"' || next === '{' || next === '[' ? this.readValue() : this.readResult()[1]);
      if (this.peek() === ']') {
        this.pos++;
        return list;
      }
      this.expect(',');
    }
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private expect(ch: string): void {
    if (this.text[this.pos] !== ch) {
      throw new Error(`Expected '${ch}' at offset ${this.pos}`);
    }
    this.pos++;
  }
}

/**
 * Quote a string as an MI c-string argument
 */
export function quoteMiString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

/**
 * Read a string field from a results tuple
 */
export function miString(tuple: MiTuple | undefined, name: string): string | undefined {
  const value = tuple?.[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read a tuple field from a results tuple
 */
export function miTuple(tuple: MiTuple | undefined, name: string): MiTuple | undefined {
  const value = tuple?.[name];
  return isMiTuple(value) ? value : undefined;
}

/**
 * Read a list field from a results tuple
 */
export function miList(tuple: MiTuple | undefined, name: string): MiValue[] {
  const value = tuple?.[name];
  return Array.isArray(value) ? value : [];
}

export function isMiTuple(value: MiValue | undefined): value is MiTuple {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
