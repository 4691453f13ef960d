import { describe, it, expect } from "vitest";
import { extractFirstJsonObject, findJsonObjectCandidates } from "../pipeline/extract.js";

describe("extractFirstJsonObject", () => {
  it("returns a bare object unchanged", () => {
    expect(extractFirstJsonObject('{"title":"A"}')).toBe('{"title":"A"}');
  });

  it("strips surrounding prose and markdown fences", () => {
    const text = 'Here is your form:\n```json\n{"title":"A","fields":[]}\n```\nEnjoy!';

    expect(extractFirstJsonObject(text)).toBe('{"title":"A","fields":[]}');
  });

  it("keeps nested objects whole", () => {
    const text = 'x {"a":{"b":{"c":1}},"d":2} y';

    expect(extractFirstJsonObject(text)).toBe('{"a":{"b":{"c":1}},"d":2}');
  });

  it("ignores braces inside strings", () => {
    const text = '{"title":"Curly } brace {","n":1} trailing }';

    expect(extractFirstJsonObject(text)).toBe('{"title":"Curly } brace {","n":1}');
  });

  it("handles escaped quotes inside strings", () => {
    const text = '{"title":"Say \\"hi\\" }"} rest';

    expect(extractFirstJsonObject(text)).toBe('{"title":"Say \\"hi\\" }"}');
  });

  it("returns only the first of several objects", () => {
    expect(extractFirstJsonObject('{"a":1} {"b":2}')).toBe('{"a":1}');
  });

  it("skips a brace pair in prose that is not JSON", () => {
    const text = 'Schema is {title, fields}. Here: {"title":"A"}';

    expect(extractFirstJsonObject(text)).toBe('{"title":"A"}');
  });

  it("skips a stray opening brace in prose", () => {
    const text = 'Open brace { starts it. {"title":"A"}';

    expect(extractFirstJsonObject(text)).toBe('{"title":"A"}');
  });

  it("returns undefined when no balanced object parses", () => {
    expect(extractFirstJsonObject("Use {title} and {fields}")).toBeUndefined();
  });

  it("returns undefined without an opening brace", () => {
    expect(extractFirstJsonObject("I cannot help with that.")).toBeUndefined();
  });

  it("returns undefined for an unbalanced object", () => {
    expect(extractFirstJsonObject('{"title":"cut off", "fields": [')).toBeUndefined();
  });
});

describe("findJsonObjectCandidates", () => {
  it("lists one balanced object per opening brace", () => {
    expect(findJsonObjectCandidates('a {x} b {"y":1}')).toEqual(["{x}", '{"y":1}']);
  });

  it("includes nested objects after their parent", () => {
    expect(findJsonObjectCandidates('{"a":{"b":1}}')).toEqual(['{"a":{"b":1}}', '{"b":1}']);
  });

  it("leaves out openings that never close", () => {
    expect(findJsonObjectCandidates("{ open {}")).toEqual(["{}"]);
  });
});
