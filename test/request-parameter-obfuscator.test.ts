import assert from "node:assert/strict";
import { Readable } from "node:stream";
import { describe, it } from "node:test";

import {
  DecodingError,
  EncodingError,
  IllegalConfigurationError,
  IndexOutOfRangeError,
} from "../src/errors.js";
import { all, fixedLength, none } from "../src/obfuscator.js";
import { CASE_INSENSITIVE, CASE_SENSITIVE } from "../src/registry.js";
import {
  LimitConfigurer,
  RequestParameterObfuscator,
  type RequestParameterObfuscatorBuilder,
} from "../src/request-parameter-obfuscator.js";
import { TextBuffer } from "../src/text.js";

const SPAN_INPUT = "xfoo=bar&hello=world&empty=&no-valuey";
const INPUT = "foo=bar&hello=world&empty=&no-value";

function createObfuscator(
  builder: RequestParameterObfuscatorBuilder | LimitConfigurer = RequestParameterObfuscator.builder(),
): RequestParameterObfuscator {
  return builder.withParameter("foo", all()).build();
}

function viaReader(obfuscator: RequestParameterObfuscator, chunks: Iterable<string>): string {
  const sb = new TextBuffer();
  obfuscator.obfuscateReader(chunks, sb);
  return sb.toString();
}

async function viaStream(obfuscator: RequestParameterObfuscator, chunks: string[]): Promise<string> {
  const sb = new TextBuffer();
  await obfuscator.obfuscateStream(Readable.from(chunks), sb);
  return sb.toString();
}

describe("RequestParameterObfuscator", () => {
  describe("unlimited", () => {
    it("obfuscates a span of text", () => {
      const obfuscator = createObfuscator();
      assert.equal(
        obfuscator.obfuscateText(SPAN_INPUT + "&x=y", 1, SPAN_INPUT.length - 1),
        "foo=***&hello=world&empty=&no-value",
      );
      assert.equal(obfuscator.obfuscateText(SPAN_INPUT, 1, 7), "foo=**");
      assert.equal(obfuscator.obfuscateText(SPAN_INPUT, 1, 4), "foo");
    });

    it("appends to a destination", () => {
      const obfuscator = createObfuscator();
      const sb = new TextBuffer();
      sb.append("query: ");
      obfuscator.obfuscateTextTo(SPAN_INPUT + "&x=y", sb, 1, SPAN_INPUT.length - 1);
      assert.equal(sb.toString(), "query: foo=***&hello=world&empty=&no-value");
    });

    it("obfuscates a synchronous character source", () => {
      const obfuscator = createObfuscator();
      const expected = "foo=***&hello=world&empty=&no-value";
      assert.equal(viaReader(obfuscator, [INPUT]), expected);
      assert.equal(viaReader(obfuscator, INPUT), expected);
      assert.equal(viaReader(obfuscator, ["foo=b", "ar&hel", "", "lo=world&empty=&no-value"]), expected);
    });

    it("obfuscates a readable stream", async () => {
      const obfuscator = createObfuscator();
      assert.equal(
        await viaStream(obfuscator, ["foo=ba", "r&hello=wor", "ld&empty=&no-value"]),
        "foo=***&hello=world&empty=&no-value",
      );
    });

    it("validates the span", () => {
      const obfuscator = createObfuscator();
      assert.throws(() => obfuscator.obfuscateText("foo=bar", 3, 2), IndexOutOfRangeError);
      assert.throws(() => obfuscator.obfuscateText("foo=bar", 0, 8), IndexOutOfRangeError);
    });
  });

  describe("limited", () => {
    describe("with truncated indicator", () => {
      it("obfuscates a span of text", () => {
        const obfuscator = createObfuscator(RequestParameterObfuscator.builder().limitTo(12));
        assert.equal(
          obfuscator.obfuscateText(SPAN_INPUT + "&x=y", 1, SPAN_INPUT.length - 1),
          "foo=***&hell... (total: 35)",
        );
        assert.equal(obfuscator.obfuscateText(SPAN_INPUT, 1, 7), "foo=**");
        assert.equal(obfuscator.obfuscateText(SPAN_INPUT, 1, 4), "foo");
      });

      it("appends to a destination", () => {
        const obfuscator = createObfuscator(RequestParameterObfuscator.builder().limitTo(12));
        const sb = new TextBuffer();
        obfuscator.obfuscateTextTo(SPAN_INPUT + "&x=y", sb, 1, SPAN_INPUT.length - 1);
        assert.equal(sb.toString(), "foo=***&hell... (total: 35)");
      });

      it("counts the whole input of a character source", async () => {
        const obfuscator = createObfuscator(RequestParameterObfuscator.builder().limitTo(12));
        assert.equal(viaReader(obfuscator, [INPUT]), "foo=***&hell... (total: 35)");
        assert.equal(viaReader(obfuscator, INPUT), "foo=***&hell... (total: 35)");
        assert.equal(await viaStream(obfuscator, [...INPUT]), "foo=***&hell... (total: 35)");
      });

      it("uses a custom template", () => {
        const obfuscator = createObfuscator(
          RequestParameterObfuscator.builder().limitTo(5).withTruncatedIndicator(" [truncated %d]"),
        );
        assert.equal(obfuscator.obfuscateText("foo=bar"), "foo=* [truncated 7]");
      });
    });

    describe("without truncated indicator", () => {
      it("obfuscates a span of text", () => {
        const obfuscator = createObfuscator(
          RequestParameterObfuscator.builder().limitTo(12).withTruncatedIndicator(null),
        );
        assert.equal(
          obfuscator.obfuscateText(SPAN_INPUT + "&x=y", 1, SPAN_INPUT.length - 1),
          "foo=***&hell",
        );
        assert.equal(obfuscator.obfuscateText(SPAN_INPUT, 1, 7), "foo=**");
        assert.equal(obfuscator.obfuscateText(SPAN_INPUT, 1, 4), "foo");
      });

      it("obfuscates a character source", async () => {
        const obfuscator = createObfuscator(
          RequestParameterObfuscator.builder().limitTo(12).withTruncatedIndicator(null),
        );
        assert.equal(viaReader(obfuscator, [INPUT]), "foo=***&hell");
        assert.equal(await viaStream(obfuscator, [INPUT]), "foo=***&hell");
      });
    });

    it("counts characters, not bytes, of a byte stream", async () => {
      const bytes = Buffer.from("x=éé&foo=é", "utf8");
      const chunks = [bytes.subarray(0, 3), bytes.subarray(3)];

      const unlimited = new TextBuffer();
      await createObfuscator().obfuscateStream(Readable.from(chunks), unlimited);
      assert.equal(unlimited.toString(), "x=éé&foo=*");

      const limited = new TextBuffer();
      await createObfuscator(RequestParameterObfuscator.builder().limitTo(4))
        .obfuscateStream(Readable.from(chunks), limited);
      assert.equal(limited.toString(), "x=éé... (total: 10)");
    });

    it("does not truncate output that exactly fits", () => {
      const obfuscator = createObfuscator(RequestParameterObfuscator.builder().limitTo(7));
      assert.equal(obfuscator.obfuscateText("foo=bar"), "foo=***");
      assert.equal(obfuscator.obfuscateText("foo=bar&"), "foo=***... (total: 8)");
    });

    describe("keeps delimiters up to the cut", () => {
      const input = "foo=bar&a=1&&b=2&foo=xy";
      const full = "foo=***&a=1&&b=2&foo=**";
      const ampersands = (text: string): number => text.split("&").length - 1;

      for (let limit = 0; limit <= input.length; limit++) {
        it(`limit ${limit}`, () => {
          const obfuscator = createObfuscator(
            RequestParameterObfuscator.builder().limitTo(limit).withTruncatedIndicator(null),
          );
          const expected = full.slice(0, limit);
          const spanOutput = obfuscator.obfuscateText(input);
          assert.equal(spanOutput, expected);
          assert.equal(ampersands(spanOutput), ampersands(input.slice(0, spanOutput.length)));
          assert.equal(viaReader(obfuscator, input.split("")), expected);
        });
      }

      it("cuts on a delimiter", () => {
        const obfuscator = createObfuscator(RequestParameterObfuscator.builder().limitTo(7));
        assert.equal(obfuscator.obfuscateText(input), "foo=***... (total: 23)");
      });

      it("cuts between two delimiters", () => {
        const obfuscator = createObfuscator(RequestParameterObfuscator.builder().limitTo(12));
        assert.equal(obfuscator.obfuscateText(input), "foo=***&a=1&... (total: 23)");
      });

      it("cuts inside a segment", () => {
        const obfuscator = createObfuscator(RequestParameterObfuscator.builder().limitTo(15));
        assert.equal(obfuscator.obfuscateText(input), "foo=***&a=1&&b=... (total: 23)");
      });
    });

    it("emits nothing but the indicator with a limit of 0", () => {
      const obfuscator = createObfuscator(RequestParameterObfuscator.builder().limitTo(0));
      assert.equal(obfuscator.obfuscateText("foo=bar"), "... (total: 7)");
      assert.equal(obfuscator.obfuscateText(""), "");
    });

    it("rejects invalid limits", () => {
      const builder = RequestParameterObfuscator.builder();
      assert.throws(() => builder.limitTo(-1), {
        name: "IllegalConfigurationError",
        message: "limit must be a non-negative integer, got: -1",
      });
      assert.throws(() => builder.limitTo(1.5), IllegalConfigurationError);
    });
  });

  describe("segments", () => {
    it("copies unregistered parameters exactly as given", () => {
      const obfuscator = createObfuscator();
      assert.equal(obfuscator.obfuscateText("r=a%20b+c&s=%7e"), "r=a%20b+c&s=%7e");
    });

    it("decodes names before the lookup and copies the raw name", () => {
      const obfuscator = RequestParameterObfuscator.builder()
        .withParameter("pass word", all())
        .build();
      assert.equal(obfuscator.obfuscateText("pass+word=a%26b&x=1"), "pass+word=***&x=1");
      assert.equal(obfuscator.obfuscateText("pass%20word=ab"), "pass%20word=**");
    });

    it("re-encodes the obfuscated value", () => {
      const obfuscator = RequestParameterObfuscator.builder()
        .withParameter("q", none())
        .withParameter("token", all("&"))
        .build();
      assert.equal(obfuscator.obfuscateText("q=a%20b"), "q=a+b");
      assert.equal(obfuscator.obfuscateText("token=abc&x=1"), "token=%26%26%26&x=1");
    });

    it("handles empty segments and empty names", () => {
      const plain = createObfuscator();
      assert.equal(plain.obfuscateText(""), "");
      assert.equal(plain.obfuscateText("="), "=");
      assert.equal(plain.obfuscateText("&&"), "&&");
      assert.equal(plain.obfuscateText("a=1&&foo=22&"), "a=1&&foo=**&");

      const withEmptyName = RequestParameterObfuscator.builder()
        .withParameter("", fixedLength(3))
        .build();
      assert.equal(withEmptyName.obfuscateText("=&=x"), "=***&=***");
    });

    it("splits name and value on the first =", () => {
      const obfuscator = createObfuscator();
      assert.equal(obfuscator.obfuscateText("foo=a=b"), "foo=***");
      assert.equal(obfuscator.obfuscateText("a=b=c&foo==="), "a=b=c&foo=**");
    });

    it("preserves every delimiter", () => {
      const obfuscator = createObfuscator();
      for (const input of ["foo=a&b&&c=&&&foo=", "&foo=x&", "a&b=c&&d"]) {
        const output = obfuscator.obfuscateText(input);
        assert.equal(output.split("&").length, input.split("&").length, input);
      }
    });
  });

  describe("case sensitivity", () => {
    it("matches case-sensitively by default", () => {
      const obfuscator = createObfuscator();
      assert.equal(obfuscator.obfuscateText("foo=ab&Foo=cd&FOO=ef"), "foo=**&Foo=cd&FOO=ef");
    });

    it("honors the default and explicit case sensitivity per parameter", () => {
      const obfuscator = RequestParameterObfuscator.builder()
        .caseInsensitiveByDefault()
        .withParameter("Token", all())
        .withParameter("Secret", all(), CASE_SENSITIVE)
        .caseSensitiveByDefault()
        .withParameter("Key", all())
        .withParameter("Session", all(), CASE_INSENSITIVE)
        .build();
      assert.equal(
        obfuscator.obfuscateText("token=ab&secret=cd&key=ef&SESSION=gh&Secret=ij&Key=kl"),
        "token=**&secret=cd&key=ef&SESSION=**&Secret=**&Key=**",
      );
    });
  });

  describe("encoding", () => {
    it("does not match a name with an odd number of UTF-16 bytes to the empty name", () => {
      const obfuscator = RequestParameterObfuscator.builder()
        .withEncoding("utf-16le")
        .withParameter("", all())
        .build();
      assert.equal(obfuscator.obfuscateText("%41=abc&=abc"), "%41=abc&=***");
    });

    it("decodes and encodes with the configured encoding", () => {
      const utf8 = RequestParameterObfuscator.builder().withParameter("name", all()).build();
      const latin1 = RequestParameterObfuscator.builder()
        .withEncoding("ISO-8859-1")
        .withParameter("name", all())
        .build();
      assert.equal(utf8.obfuscateText("name=%C3%A9t%C3%A9"), "name=***");
      assert.equal(latin1.obfuscateText("name=%E9t%E9"), "name=***");
      assert.equal(latin1.obfuscateText("name=%C3%A9"), "name=**");
    });

    it("fails on unknown encodings", () => {
      assert.throws(() => RequestParameterObfuscator.builder().withEncoding("klingon"), EncodingError);
    });

    it("fails when the obfuscated value cannot be encoded", () => {
      const obfuscator = RequestParameterObfuscator.builder()
        .withEncoding("US-ASCII")
        .withParameter("foo", all("•"))
        .build();
      assert.throws(() => obfuscator.obfuscateText("foo=bar"), EncodingError);
    });
  });

  describe("decoding errors", () => {
    it("fails on malformed names and values of registered parameters", () => {
      const obfuscator = createObfuscator();
      assert.throws(() => obfuscator.obfuscateText("%zz=1"), DecodingError);
      assert.throws(() => obfuscator.obfuscateText("a=1&foo=%"), DecodingError);
    });

    it("does not decode values of unregistered parameters", () => {
      const obfuscator = createObfuscator();
      assert.equal(obfuscator.obfuscateText("bar=%zz"), "bar=%zz");
    });

    it("stays usable after a failure", () => {
      const obfuscator = createObfuscator();
      assert.throws(() => viaReader(obfuscator, ["foo=%g"]), DecodingError);
      assert.equal(obfuscator.obfuscateText("foo=bar"), "foo=***");
    });
  });

  describe("single values", () => {
    it("obfuscates a named value without parsing", () => {
      const obfuscator = createObfuscator();
      assert.equal(obfuscator.obfuscateParameter("foo", "a&b=c"), "*****");
      assert.equal(obfuscator.obfuscateParameter("bar", "a&b=c"), "a&b=c");

      const sb = new TextBuffer();
      obfuscator.obfuscateParameterTo("foo", "abc", sb);
      assert.equal(sb.toString(), "***");
    });

    it("keeps the original value of an obfuscated parameter", () => {
      const obfuscator = createObfuscator();
      const value = "hunter2";
      const obfuscated = obfuscator.obfuscateParameterValue("foo", value);
      assert.equal(obfuscated.value(), value);
      assert.equal(obfuscated.toString(), "*******");
      assert.equal(obfuscator.obfuscateParameterValue("bar", value).toString(), value);
    });

    it("ignores the output limit", () => {
      const obfuscator = createObfuscator(RequestParameterObfuscator.builder().limitTo(2));
      assert.equal(obfuscator.obfuscateParameter("foo", "abcdef"), "******");
    });
  });

  describe("obfuscateUrl", () => {
    it("obfuscates only the query string", () => {
      const obfuscator = createObfuscator();
      assert.equal(
        obfuscator.obfuscateUrl("https://example.com/p?foo=bar&q=1#foo=frag"),
        "https://example.com/p?foo=***&q=1#foo=frag",
      );
      assert.equal(obfuscator.obfuscateUrl("/search?q=1&foo=x"), "/search?q=1&foo=*");
      assert.equal(obfuscator.obfuscateUrl("https://example.com/foo=bar"), "https://example.com/foo=bar");
    });
  });

  describe("builder", () => {
    it("applies a function to the builder", () => {
      const builder = RequestParameterObfuscator.builder();
      assert.equal(builder.transform((b) => (b === builder ? "result" : "other")), "result");
    });

    it("continues building from the limit configurer", () => {
      const configurer = RequestParameterObfuscator.builder().limitTo(3);
      assert.ok(configurer instanceof LimitConfigurer);
      const obfuscator = configurer
        .withTruncatedIndicator(null)
        .withParameter("foo", all())
        .withEncoding("utf-8")
        .build();
      assert.equal(obfuscator.obfuscateText("foo=bar"), "foo");
    });

    it("describes the obfuscator", () => {
      const obfuscator = createObfuscator(RequestParameterObfuscator.builder().limitTo(10));
      assert.equal(
        obfuscator.toString(),
        'RequestParameterObfuscator[obfuscators={foo=Obfuscator.all(*)},encoding=utf-8,limit=10,truncatedIndicator="... (total: %d)"]',
      );
      assert.equal(
        createObfuscator().toString(),
        'RequestParameterObfuscator[obfuscators={foo=Obfuscator.all(*)},encoding=utf-8,limit=unbounded,truncatedIndicator="... (total: %d)"]',
      );
    });
  });
});
