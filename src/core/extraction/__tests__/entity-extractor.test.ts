/**
 * EntityExtractor Tests
 *
 * Runs the real Python grammar.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { ParserManager } from "../../parser/parser-manager.js";
import { EntityExtractor } from "../entity-extractor.js";
import { entityKey } from "../id-generator.js";
import { FileParsingError } from "../../errors.js";
import type { Entity } from "../types.js";

const MODELS = `"""Shop models."""
from __future__ import annotations
import os, json as j
from .base import Base

@register
class Sub(Base, metaclass=Meta):
    """A subclass."""

    def save(self, force: bool = False, *args) -> bool:
        self.repo.save(self)
        return helper(force)

async def helper(x, /, y, *, z):
    def inner():
        audit()
    return y
`;

function byName(entities: readonly Entity[], name: string): Entity {
  const entity = entities.find((candidate) => candidate.name === name);
  if (!entity) throw new Error(`no entity named ${name}`);
  return entity;
}

describe("EntityExtractor", () => {
  let parser: ParserManager;
  let extractor: EntityExtractor;

  beforeAll(async () => {
    parser = new ParserManager();
    await parser.initialize();
    extractor = new EntityExtractor(parser);
  });

  afterAll(async () => {
    await parser.close();
  });

  it("emits entities in source order", () => {
    const result = extractor.extract("shop/models.py", MODELS);

    expect(result.entities.map((entity) => `${entity.kind}:${entity.name}`)).toEqual([
      "File:shop.models",
      "Docstring:shop/models.py::docstring",
      "Class:Sub",
      "Docstring:shop/models.py::Sub::docstring",
      "Method:save",
      "Parameter:Sub.save.self",
      "Parameter:Sub.save.force",
      "ReturnType:bool",
      "Function:helper",
      "Parameter:helper.y",
    ]);
  });

  it("names the module and package from the path", () => {
    const result = extractor.extract("shop/models.py", MODELS);

    expect(result.filePath).toBe("shop/models.py");
    expect(result.qualifiedModule).toBe("shop.models");
    expect(result.packagePath).toBe("shop");
    expect(extractor.extract("shop\\__init__.py", "").qualifiedModule).toBe("shop");
  });

  it("collects imported modules and skips __future__", () => {
    expect(extractor.extract("shop/models.py", MODELS).imports).toEqual(["os", "json", ".base"]);
  });

  it("describes classes", () => {
    const sub = byName(extractor.extract("shop/models.py", MODELS).entities, "Sub");

    expect(sub).toMatchObject({
      lineNumber: 7,
      docstring: "A subclass.",
      decorators: ["register"],
      bases: ["Base"],
      parentClass: null,
    });
  });

  it("keys a nested class by module alone", () => {
    const entities = extractor.extract("shop/forms.py", "class Outer:\n    class Meta:\n        pass\n\n    def run(self):\n        pass\n").entities;
    const meta = byName(entities, "Meta");

    expect(meta).toMatchObject({ kind: "Class", parentClass: null });
    expect(entityKey(meta)).toBe("Class:shop.forms:Meta");
    expect(byName(entities, "run")).toMatchObject({ kind: "Method", parentClass: "Outer" });
  });

  it("describes methods with parameters, return type and calls", () => {
    const save = byName(extractor.extract("shop/models.py", MODELS).entities, "save");

    expect(save).toMatchObject({
      kind: "Method",
      lineNumber: 10,
      parentClass: "Sub",
      parameters: ["self", "force"],
      returnType: "bool",
      isAsync: false,
      calls: [
        { kind: "method", object: "self.repo", name: "save" },
        { kind: "function", name: "helper" },
      ],
    });
  });

  it("keeps only positional-or-keyword parameters and ignores nested scopes", () => {
    const entities = extractor.extract("shop/models.py", MODELS).entities;
    const helper = byName(entities, "helper");

    expect(helper).toMatchObject({ kind: "Function", isAsync: true, parameters: ["y"], calls: [] });
    expect(entities.some((entity) => entity.name === "inner")).toBe(false);
  });

  it("links owned entities to their owner", () => {
    const entities = extractor.extract("shop/models.py", MODELS).entities;

    expect(byName(entities, "Sub.save.force").owner).toBe("Sub.save");
    expect(byName(entities, "bool").owner).toBe("Sub.save");
    expect(byName(entities, "shop/models.py::docstring")).toMatchObject({ owner: "shop.models", content: "Shop models." });
  });

  it("rejects a file with a syntax error", () => {
    expect(() => extractor.extract("bad.py", "def broken(:\n    pass\n")).toThrow(FileParsingError);
    expect(() => extractor.extract("bad.py", "def broken(:\n    pass\n")).toThrow(/^Failed to parse bad\.py: Syntax error/);
  });
});
