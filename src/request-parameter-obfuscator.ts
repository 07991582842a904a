/**
 * Obfuscates request parameters in query strings and form data.
 *
 * Input has the form `name1=value1&name2=value2`. Names and values are
 * percent-decoded before the name is looked up and the value is obfuscated;
 * the obfuscated value is percent-encoded again. Segments whose name is not
 * registered, or that have no `=`, are copied through exactly as given.
 *
 * Usage:
 *
 *   const obfuscator = RequestParameterObfuscator.builder()
 *     .withParameter("password", all())
 *     .limitTo(1024)
 *     .build();
 *   obfuscator.obfuscateText("user=alice&password=hunter2");
 *   // "user=alice&password=*******"
 */

import { IllegalConfigurationError, requireNonNull } from "./errors.js";
import {
  DEFAULT_TRUNCATED_INDICATOR,
  LimitAppendable,
  formatTruncatedIndicator,
} from "./limit.js";
import { type Obfuscated, Obfuscator } from "./obfuscator.js";
import {
  type Charset,
  percentDecode,
  percentEncode,
  resolveCharset,
} from "./percent-encoding.js";
import {
  type CaseSensitivity,
  ObfuscatorRegistry,
  type RegistryBuilder,
} from "./registry.js";
import {
  type SegmentHandler,
  StreamSplitter,
  indexOfSeparator,
  splitSpan,
} from "./splitter.js";
import { type Appendable, type TextChunks, decodeChunks } from "./text.js";

export interface RequestParameterObfuscatorOptions {
  registry: ObfuscatorRegistry;
  encoding: Charset;
  /** Maximum number of output characters; `Infinity` for no limit. */
  limit: number;
  /** Appended once when the output was cut off; `null` for none. */
  truncatedIndicator: string | null;
}

export class RequestParameterObfuscator extends Obfuscator {
  private readonly registry: ObfuscatorRegistry;
  private readonly encoding: Charset;
  private readonly limit: number;
  private readonly truncatedIndicator: string | null;

  constructor(options: RequestParameterObfuscatorOptions) {
    super();
    this.registry = options.registry;
    this.encoding = options.encoding;
    this.limit = options.limit;
    this.truncatedIndicator = options.truncatedIndicator;
  }

  static builder(): RequestParameterObfuscatorBuilder {
    return new RequestParameterObfuscatorBuilder();
  }

  protected appendObfuscated(
    s: string,
    start: number,
    end: number,
    destination: Appendable,
  ): void {
    const limited = this.limited(destination);
    splitSpan(s, start, end, this.segmentHandler(limited ?? destination, limited));
    this.appendTruncatedIndicator(limited, destination, end - start);
  }

  obfuscateReader(input: Iterable<string>, destination: Appendable): void {
    requireNonNull(input, "input");
    requireNonNull(destination, "destination");
    const limited = this.limited(destination);
    const splitter = new StreamSplitter(this.segmentHandler(limited ?? destination, limited));
    for (const chunk of input) splitter.push(chunk);
    splitter.end();
    this.appendTruncatedIndicator(limited, destination, splitter.charactersRead);
  }

  async obfuscateStream(input: TextChunks, destination: Appendable): Promise<void> {
    requireNonNull(input, "input");
    requireNonNull(destination, "destination");
    const limited = this.limited(destination);
    const splitter = new StreamSplitter(this.segmentHandler(limited ?? destination, limited));
    for await (const chunk of decodeChunks(input)) splitter.push(chunk);
    splitter.end();
    this.appendTruncatedIndicator(limited, destination, splitter.charactersRead);
  }

  /** Obfuscate a single, already decoded parameter value. No limit applies. */
  obfuscateParameter(name: string, value: string): string {
    return this.registry.lookup(requireNonNull(name, "name")).obfuscateText(value);
  }

  obfuscateParameterTo(name: string, value: string, destination: Appendable): void {
    this.registry.lookup(requireNonNull(name, "name")).obfuscateTextTo(value, destination);
  }

  obfuscateParameterValue(name: string, value: string): Obfuscated<string> {
    return this.registry.lookup(requireNonNull(name, "name")).obfuscateObject(value);
  }

  /**
   * Obfuscate the query string of a URL. Everything before the first `?` and
   * from the fragment `#` on is copied as-is.
   */
  obfuscateUrl(url: string): string {
    requireNonNull(url, "url");
    const queryStart = url.indexOf("?");
    if (queryStart === -1) return url;
    const hash = url.indexOf("#", queryStart + 1);
    const queryEnd = hash === -1 ? url.length : hash;
    return (
      url.slice(0, queryStart + 1) +
      this.obfuscateText(url, queryStart + 1, queryEnd) +
      url.slice(queryEnd)
    );
  }

  toString(): string {
    const limit = Number.isFinite(this.limit) ? String(this.limit) : "unbounded";
    return (
      `RequestParameterObfuscator[obfuscators=${this.registry}` +
      `,encoding=${this.encoding}` +
      `,limit=${limit}` +
      `,truncatedIndicator=${JSON.stringify(this.truncatedIndicator)}]`
    );
  }

  private limited(destination: Appendable): LimitAppendable | undefined {
    return Number.isFinite(this.limit)
      ? new LimitAppendable(destination, this.limit)
      : undefined;
  }

  private appendTruncatedIndicator(
    limited: LimitAppendable | undefined,
    destination: Appendable,
    totalLength: number,
  ): void {
    if (limited?.limitExceeded && this.truncatedIndicator !== null) {
      destination.append(formatTruncatedIndicator(this.truncatedIndicator, totalLength));
    }
  }

  private segmentHandler(
    destination: Appendable,
    limited: LimitAppendable | undefined,
  ): SegmentHandler {
    return {
      segment: (s, start, end) => this.obfuscateKeyValue(s, start, end, destination),
      delimiter: () => destination.append("&"),
      isDone: () => limited?.limitExceeded ?? false,
    };
  }

  private obfuscateKeyValue(
    s: string,
    start: number,
    end: number,
    destination: Appendable,
  ): void {
    const index = indexOfSeparator(s, start, end);
    if (index === -1) {
      // no value so nothing to obfuscate
      destination.append(s.slice(start, end));
      return;
    }
    const name = percentDecode(s.slice(start, index), this.encoding);
    const obfuscator = this.registry.get(name);
    if (obfuscator === undefined) {
      destination.append(s.slice(start, end));
      return;
    }
    const value = percentDecode(s.slice(index + 1, end), this.encoding);
    destination.append(s.slice(start, index + 1));
    destination.append(percentEncode(obfuscator.obfuscateText(value), this.encoding));
  }
}

export class RequestParameterObfuscatorBuilder {
  private readonly obfuscators: RegistryBuilder = ObfuscatorRegistry.builder();
  private encoding: Charset = "utf-8";
  private limit = Number.POSITIVE_INFINITY;
  private truncatedIndicator: string | null = DEFAULT_TRUNCATED_INDICATOR;

  /**
   * Adds a parameter to obfuscate. Without `caseSensitivity` the current
   * default applies (case sensitive unless changed).
   */
  withParameter(
    name: string,
    obfuscator: Obfuscator,
    caseSensitivity?: CaseSensitivity,
  ): this {
    this.obfuscators.withEntry(name, obfuscator, caseSensitivity);
    return this;
  }

  caseSensitiveByDefault(): this {
    this.obfuscators.caseSensitiveByDefault();
    return this;
  }

  caseInsensitiveByDefault(): this {
    this.obfuscators.caseInsensitiveByDefault();
    return this;
  }

  /** Character encoding for percent-decoding and encoding. Defaults to UTF-8. */
  withEncoding(encoding: string): this {
    this.encoding = resolveCharset(requireNonNull(encoding, "encoding"));
    return this;
  }

  /** Limit the output of text obfuscation to `limit` characters. */
  limitTo(limit: number): LimitConfigurer {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new IllegalConfigurationError(
        `limit must be a non-negative integer, got: ${limit}`,
      );
    }
    this.limit = limit;
    return new LimitConfigurer(this, (template) => {
      this.truncatedIndicator = template;
    });
  }

  transform<R>(f: (builder: this) => R): R {
    return f(this);
  }

  build(): RequestParameterObfuscator {
    return new RequestParameterObfuscator({
      registry: this.obfuscators.build(),
      encoding: this.encoding,
      limit: this.limit,
      truncatedIndicator: this.truncatedIndicator,
    });
  }
}

/** Returned by `limitTo`; configures what is appended when output is truncated. */
export class LimitConfigurer {
  private readonly builder: RequestParameterObfuscatorBuilder;
  private readonly setTruncatedIndicator: (template: string | null) => void;

  constructor(
    builder: RequestParameterObfuscatorBuilder,
    setTruncatedIndicator: (template: string | null) => void,
  ) {
    this.builder = builder;
    this.setTruncatedIndicator = setTruncatedIndicator;
  }

  /**
   * Template appended after truncated output, with `%d` replaced by the total
   * input length. Defaults to `"... (total: %d)"`; `null` appends nothing.
   */
  withTruncatedIndicator(template: string | null): this {
    if (template !== null && typeof template !== "string") {
      throw new IllegalConfigurationError("truncated indicator must be a string or null");
    }
    this.setTruncatedIndicator(template);
    return this;
  }

  withParameter(
    name: string,
    obfuscator: Obfuscator,
    caseSensitivity?: CaseSensitivity,
  ): RequestParameterObfuscatorBuilder {
    return this.builder.withParameter(name, obfuscator, caseSensitivity);
  }

  caseSensitiveByDefault(): RequestParameterObfuscatorBuilder {
    return this.builder.caseSensitiveByDefault();
  }

  caseInsensitiveByDefault(): RequestParameterObfuscatorBuilder {
    return this.builder.caseInsensitiveByDefault();
  }

  withEncoding(encoding: string): RequestParameterObfuscatorBuilder {
    return this.builder.withEncoding(encoding);
  }

  limitTo(limit: number): LimitConfigurer {
    return this.builder.limitTo(limit);
  }

  build(): RequestParameterObfuscator {
    return this.builder.build();
  }
}
