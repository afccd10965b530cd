import { pipeline, type Readable } from 'stream';
import Parser from 'stream-json/Parser.js';
import { StructuralError, errorMessage } from '../../types/errors.js';

export type JsonToken =
  | { type: 'startObject' }
  | { type: 'endObject' }
  | { type: 'startArray' }
  | { type: 'endArray' }
  | { type: 'key'; value: string }
  | { type: 'string'; value: string }
  | { type: 'number'; value: string }
  | { type: 'boolean'; value: boolean }
  | { type: 'null' };

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

type PathSegment = string | number;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Map a packed stream-json token onto {@link JsonToken}.
 */
function toJsonToken(raw: unknown): JsonToken {
  const name = isRecord(raw) ? raw.name : undefined;
  if (!isRecord(raw) || typeof name !== 'string') {
    throw new Error(`Unrecognized parser token: ${JSON.stringify(raw)}`);
  }
  const value = raw.value;
  switch (name) {
    case 'startObject':
    case 'endObject':
    case 'startArray':
    case 'endArray':
      return { type: name };
    case 'keyValue':
      if (typeof value === 'string') return { type: 'key', value };
      break;
    case 'stringValue':
      if (typeof value === 'string') return { type: 'string', value };
      break;
    case 'numberValue':
      if (typeof value === 'string') return { type: 'number', value };
      break;
    case 'trueValue':
      return { type: 'boolean', value: true };
    case 'falseValue':
      return { type: 'boolean', value: false };
    case 'nullValue':
      return { type: 'null' };
  }
  throw new Error(`Unexpected parser token "${name}"`);
}

/** Parser tokens buffered ahead of the reader before the input is paused */
const QUEUE_HIGH_WATER_MARK = 4096;
const QUEUE_LOW_WATER_MARK = 1024;

/**
 * Packed stream-json tokens (whole keys, strings and numbers, never partial
 * chunks) from a byte stream.
 *
 * The parser flows into a bounded queue and the input is paused while the
 * queue is full. A parser or input failure is held back until every token
 * parsed before it has been handed out. Ending the iterator early destroys
 * the parser and, through the pipeline, the input.
 */
class ParserTokenStream implements AsyncIterator<unknown> {
  private readonly parser = new Parser({ packValues: true, streamValues: false });
  private readonly queue: unknown[] = [];
  private failure: { error: unknown } | null = null;
  private ended = false;
  private paused = false;
  private wake: (() => void) | null = null;

  constructor(private readonly input: Readable) {
    this.parser.on('data', (token: unknown) => {
      this.queue.push(token);
      if (!this.paused && this.queue.length >= QUEUE_HIGH_WATER_MARK) {
        this.paused = true;
        this.input.pause();
      }
      this.notify();
    });
    this.parser.once('end', () => {
      this.ended = true;
      this.notify();
    });
    pipeline(this.input, this.parser, (error) => {
      if (error && !this.ended) {
        this.failure = { error };
        this.notify();
      }
    });
  }

  async next(): Promise<IteratorResult<unknown>> {
    for (;;) {
      if (this.queue.length > 0) {
        const value = this.queue.shift();
        if (this.paused && this.queue.length <= QUEUE_LOW_WATER_MARK) {
          this.paused = false;
          this.input.resume();
        }
        return { done: false, value };
      }
      if (this.failure) {
        throw this.failure.error;
      }
      if (this.ended) {
        return { done: true, value: undefined };
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  async return(): Promise<IteratorResult<unknown>> {
    this.ended = true;
    this.queue.length = 0;
    this.parser.destroy();
    this.notify();
    return { done: true, value: undefined };
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * Pull-based reader over a JSON token stream with one token of lookahead.
 *
 * The reader also tracks the traversal path pushed by its caller so that
 * structural errors can say where in the document they happened.
 */
export class JsonTokenReader {
  private lookahead: JsonToken | null = null;
  private readonly segments: PathSegment[] = [];

  constructor(private readonly tokens: AsyncIterator<unknown>) {}

  static fromStream(input: Readable): JsonTokenReader {
    return new JsonTokenReader(new ParserTokenStream(input));
  }

  get path(): string {
    return '$' + this.segments
      .map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`))
      .join('');
  }

  enter(segment: PathSegment): void {
    this.segments.push(segment);
  }

  leave(): void {
    this.segments.pop();
  }

  error(message: string, context?: { recordIndex?: number; field?: string }): StructuralError {
    return new StructuralError(message, { path: this.path, ...context });
  }

  async peek(): Promise<JsonToken> {
    if (!this.lookahead) {
      this.lookahead = await this.pull();
    }
    return this.lookahead;
  }

  async next(): Promise<JsonToken> {
    const token = await this.peek();
    this.lookahead = null;
    return token;
  }

  /**
   * Consume the next token, failing unless it has the given type.
   */
  async expect<T extends JsonToken['type']>(type: T, message: string): Promise<Extract<JsonToken, { type: T }>> {
    const token = await this.next();
    if (!isTokenOfType(token, type)) {
      throw this.error(`${message} (found ${describe(token)})`);
    }
    return token;
  }

  /**
   * Inside an object: the next key, or `null` once the object has closed.
   */
  async nextKey(): Promise<string | null> {
    const token = await this.next();
    if (token.type === 'endObject') {
      return null;
    }
    if (token.type !== 'key') {
      throw this.error(`Expected object key (found ${describe(token)})`);
    }
    return token.value;
  }

  /**
   * Inside an array: whether another element follows. Consumes the closing
   * bracket when there is none.
   */
  async hasNextElement(): Promise<boolean> {
    const token = await this.peek();
    if (token.type === 'endArray') {
      await this.next();
      return false;
    }
    return true;
  }

  /**
   * Discard the next value without building it, keeping delimiters balanced.
   */
  async skipValue(): Promise<void> {
    let depth = 0;
    do {
      const token = await this.next();
      switch (token.type) {
        case 'startObject':
        case 'startArray':
          depth++;
          break;
        case 'endObject':
        case 'endArray':
          depth--;
          break;
        case 'key':
          if (depth === 0) {
            throw this.error('Expected a value but found an object key');
          }
          break;
      }
      if (depth < 0) {
        throw this.error(`Expected a value (found ${describe(token)})`);
      }
    } while (depth > 0);
  }

  /**
   * Build the next value. Only for values known to be small.
   */
  async readValue(): Promise<JsonValue> {
    const token = await this.next();
    switch (token.type) {
      case 'string':
        return token.value;
      case 'number':
        return Number(token.value);
      case 'boolean':
        return token.value;
      case 'null':
        return null;
      case 'startArray': {
        const items: JsonValue[] = [];
        while (await this.hasNextElement()) {
          items.push(await this.readValue());
        }
        return items;
      }
      case 'startObject': {
        const object: { [key: string]: JsonValue } = {};
        for (let key = await this.nextKey(); key !== null; key = await this.nextKey()) {
          // defineProperty so a "__proto__" key stays an own property
          Object.defineProperty(object, key, {
            value: await this.readValue(),
            enumerable: true,
            writable: true,
            configurable: true,
          });
        }
        return object;
      }
      default:
        throw this.error(`Expected a value (found ${describe(token)})`);
    }
  }

  /**
   * Stop reading and release the underlying streams.
   */
  async close(): Promise<void> {
    await this.tokens.return?.();
  }

  private async pull(): Promise<JsonToken> {
    let result: IteratorResult<unknown>;
    try {
      result = await this.tokens.next();
    } catch (error) {
      throw this.error(`Malformed JSON input: ${errorMessage(error)}`);
    }
    if (result.done) {
      throw this.error('Unexpected end of input');
    }
    return toJsonToken(result.value);
  }
}

function isTokenOfType<T extends JsonToken['type']>(
  token: JsonToken,
  type: T
): token is Extract<JsonToken, { type: T }> {
  return token.type === type;
}

function describe(token: JsonToken): string {
  switch (token.type) {
    case 'key':
      return `key "${token.value}"`;
    case 'string':
    case 'number':
      return `${token.type} ${JSON.stringify(token.value)}`;
    case 'boolean':
      return `boolean ${token.value}`;
    default:
      return token.type;
  }
}
