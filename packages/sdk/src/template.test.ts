/**
 * Tests for path template compilation
 */

import { describe, it, expect } from "vitest";
import { compileTemplate, directoryOf, joinPath } from "./template.js";
import { MissingKeyError, TemplateError, TypeMismatchError } from "./errors.js";

describe("compileTemplate", () => {
  describe("parsing", () => {
    it("should list placeholder names in order", () => {
      const template = compileTemplate("/data/{country}/{company}/{year:int}_revenue.json");
      expect(template.placeholderNames()).toEqual(["country", "company", "year"]);
    });

    it("should resolve type aliases", () => {
      const template = compileTemplate("/{a}/{b:str}/{c:d}/{d:integer}/{e:f}/{f:number}");
      expect(template.placeholderType("a")).toBe("string");
      expect(template.placeholderType("b")).toBe("string");
      expect(template.placeholderType("c")).toBe("integer");
      expect(template.placeholderType("d")).toBe("integer");
      expect(template.placeholderType("e")).toBe("float");
      expect(template.placeholderType("f")).toBe("float");
      expect(template.placeholderType("missing")).toBeUndefined();
    });

    it("should reject repeated placeholder names", () => {
      expect(() => compileTemplate("/{id}/{id}.json")).toThrow(TemplateError);
    });

    it("should reject unknown type annotations", () => {
      expect(() => compileTemplate("/{id:uuid}.json")).toThrow(/unknown type "uuid"/);
    });

    it("should reject unbalanced braces", () => {
      expect(() => compileTemplate("/{id.json")).toThrow(TemplateError);
      expect(() => compileTemplate("/id}.json")).toThrow(TemplateError);
      expect(() => compileTemplate("/{a{b}}.json")).toThrow(TemplateError);
    });

    it("should reject invalid placeholder names", () => {
      expect(() => compileTemplate("/{}.json")).toThrow(/invalid placeholder name/);
      expect(() => compileTemplate("/{1st}.json")).toThrow(/invalid placeholder name/);
    });

    it("should treat doubled braces as literals", () => {
      const template = compileTemplate("/raw/{{literal}}/{id}.json");
      expect(template.placeholderNames()).toEqual(["id"]);
      expect(template.build({ id: "x" })).toBe("/raw/{literal}/x.json");
      expect(template.match("/raw/{literal}/x.json")).toEqual({ id: "x" });
    });
  });

  describe("match", () => {
    const template = compileTemplate("/data/{country}/{company}/{year:int}_revenue.json");

    it("should extract typed values", () => {
      expect(template.match("/data/France/OVH/2019_revenue.json")).toEqual({
        country: "France",
        company: "OVH",
        year: 2019,
      });
    });

    it("should return null for non-conforming paths", () => {
      expect(template.match("/data/France/OVH/info.json")).toBeNull();
      expect(template.match("/data/France/OVH/x2019_revenue.json")).toBeNull();
      expect(template.match("data/France/OVH/2019_revenue.json")).toBeNull();
    });

    it("should not let string placeholders span separators", () => {
      expect(template.match("/data/France/Paris/OVH/2019_revenue.json")).toBeNull();
    });

    it("should match literal regex characters verbatim", () => {
      const dotted = compileTemplate("/v1.0/(x)/{id}.json");
      expect(dotted.match("/v1.0/(x)/a.json")).toEqual({ id: "a" });
      expect(dotted.match("/v1x0/(x)/a.json")).toBeNull();
    });

    it("should parse integer prefixes and signs", () => {
      const ints = compileTemplate("/{n:int}");
      expect(ints.match("/0x1F")).toEqual({ n: 31 });
      expect(ints.match("/0o17")).toEqual({ n: 15 });
      expect(ints.match("/0b101")).toEqual({ n: 5 });
      expect(ints.match("/-42")).toEqual({ n: -42 });
      expect(ints.match("/+7")).toEqual({ n: 7 });
      expect(ints.match("/1.5")).toBeNull();
      expect(ints.match("/99999999999999999999")).toBeNull();
    });

    it("should parse the float grammar", () => {
      const floats = compileTemplate("/{x:float}");
      expect(floats.match("/1.5")).toEqual({ x: 1.5 });
      expect(floats.match("/-.25")).toEqual({ x: -0.25 });
      expect(floats.match("/2e3")).toEqual({ x: 2000 });
      expect(floats.match("/inf")).toEqual({ x: Number.POSITIVE_INFINITY });
      expect(floats.match("/-Infinity")).toEqual({ x: Number.NEGATIVE_INFINITY });
      expect(floats.match("/abc")).toBeNull();
    });
  });

  describe("build", () => {
    const template = compileTemplate("/data/{country}/{company}/{year:int}_revenue.json");

    it("should build a concrete path", () => {
      expect(template.build({ country: "France", company: "OVH", year: 2019 })).toBe(
        "/data/France/OVH/2019_revenue.json"
      );
    });

    it("should ignore keys that are not placeholders", () => {
      expect(template.build({ country: "France", company: "OVH", year: 2019, revenue: 10 })).toBe(
        "/data/France/OVH/2019_revenue.json"
      );
    });

    it("should name every missing placeholder", () => {
      try {
        template.build({ country: "France" });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(MissingKeyError);
        expect(err).toMatchObject({ missing: ["company", "year"], code: "E_MISSING_KEY" });
      }
    });

    it("should reject values of the wrong type", () => {
      expect(() => template.build({ country: "France", company: "OVH", year: "2019" })).toThrow(
        TypeMismatchError
      );
      expect(() => template.build({ country: "France", company: "OVH", year: 2019.5 })).toThrow(
        TypeMismatchError
      );
      expect(() => template.build({ country: 1, company: "OVH", year: 2019 })).toThrow(TypeMismatchError);
    });

    it("should reject strings that would change the path shape", () => {
      expect(() => template.build({ country: "Fr/ance", company: "OVH", year: 2019 })).toThrow(
        TypeMismatchError
      );
      expect(() => template.build({ country: "", company: "OVH", year: 2019 })).toThrow(TypeMismatchError);
    });

    it("should round-trip through match", () => {
      const mixed = compileTemplate("/{name}/{n:int}/{x:float}.dat");
      const bindings = [
        { name: "alpha", n: 0, x: 0.5 },
        { name: "beta gamma", n: -12, x: -3.25 },
        { name: "d.e", n: 123456, x: 1e21 },
      ];
      for (const binding of bindings) {
        expect(mixed.match(mixed.build(binding))).toEqual(binding);
      }
    });
  });

  describe("prefixes", () => {
    const template = compileTemplate("/data/{country}/{company}/info.json");

    it("should return the literal text before the first placeholder", () => {
      expect(template.globPrefix()).toBe("/data/");
      expect(template.rootFolder()).toBe("/data");
    });

    it("should fill leading constrained placeholders", () => {
      expect(template.prefixFor({ country: "France" })).toBe("/data/France/");
      expect(template.prefixFor({ company: "OVH" })).toBe("/data/");
      expect(template.prefixFor({ country: "France", company: "OVH" })).toBe("/data/France/OVH/info.json");
    });

    it("should stop at numeric placeholders", () => {
      const typed = compileTemplate("/data/{country}/{year:int}/{rate:float}.json");
      expect(typed.prefixFor({ country: "France", year: 5 })).toBe("/data/France/");
      expect(typed.prefixFor({ country: "France", year: 5, rate: 1.5 })).toBe("/data/France/");
    });
  });
});

describe("directoryOf", () => {
  it("should return the directory part of a prefix", () => {
    expect(directoryOf("/data/x_")).toBe("/data");
    expect(directoryOf("/data/")).toBe("/data");
    expect(directoryOf("/x")).toBe("/");
    expect(directoryOf("x")).toBe("");
  });
});

describe("joinPath", () => {
  it("should join with a single separator", () => {
    expect(joinPath("/data", "a.json")).toBe("/data/a.json");
    expect(joinPath("/", "a.json")).toBe("/a.json");
    expect(joinPath("", "a.json")).toBe("a.json");
  });
});
