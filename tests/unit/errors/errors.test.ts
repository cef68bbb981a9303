import { MongoServerError } from "mongodb";
import { describe, expect, it } from "vitest";
import {
  BrokenReferenceError,
  DoesNotExistError,
  isStorageError,
  MissingDataSourceError,
  ModelDefinitionError,
  MultipleObjectsReturnedError,
  OperationError,
  QueryTranslationError,
  ValidationError,
} from "../../../src/errors";

describe("errors", () => {
  it("should name every error after its class", () => {
    const errors = [
      new ValidationError("title", "required", "title is required."),
      new DoesNotExistError("Post"),
      new MultipleObjectsReturnedError("Post"),
      new BrokenReferenceError("User", "a@example.com"),
      new QueryTranslationError("bad query"),
      new OperationError("bad operation"),
      new ModelDefinitionError("bad model"),
      new MissingDataSourceError("no data source"),
    ];

    expect(errors.map(error => error.name)).toEqual([
      "ValidationError",
      "DoesNotExistError",
      "MultipleObjectsReturnedError",
      "BrokenReferenceError",
      "QueryTranslationError",
      "OperationError",
      "ModelDefinitionError",
      "MissingDataSourceError",
    ]);

    for (const error of errors) {
      expect(error).toBeInstanceOf(Error);
      expect(error.stack).toBeDefined();
    }
  });

  it("should carry the failing field and constraint", () => {
    const error = new ValidationError("comments.1.body", "blank", "comments.1.body cannot be blank.", "");

    expect(error).toMatchObject({
      field: "comments.1.body",
      constraint: "blank",
      value: "",
      message: "comments.1.body cannot be blank.",
    });
  });

  it("should build default messages from the model name", () => {
    expect(new DoesNotExistError("Post").message).toBe("Post matching query does not exist.");
    expect(new MultipleObjectsReturnedError("Post").message).toBe(
      "The query returned more than one Post.",
    );
    expect(new BrokenReferenceError("User", "a@example.com").message).toBe(
      'Referenced User with id "a@example.com" does not exist.',
    );
  });

  it("should keep the data source name of MissingDataSourceError", () => {
    const error = new MissingDataSourceError("Not found", "primary");

    expect(error.dataSourceName).toBe("primary");
  });

  describe("isStorageError()", () => {
    it("should accept driver errors", () => {
      const error = new MongoServerError({ message: "E11000 duplicate key error", code: 11000 });

      expect(isStorageError(error)).toBe(true);
    });

    it("should reject engine errors", () => {
      expect(isStorageError(new QueryTranslationError("bad query"))).toBe(false);
      expect(isStorageError("E11000")).toBe(false);
    });
  });
});
