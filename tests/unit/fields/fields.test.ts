import { ObjectId } from "mongodb";
import { describe, expect, it } from "vitest";
import { ModelDefinitionError } from "../../../src/errors/model-definition.error";
import { ValidationError } from "../../../src/errors/validation.error";
import {
  BooleanField,
  CharField,
  DateTimeField,
  DictField,
  EmailField,
  FloatField,
  IntegerField,
  ListField,
  ObjectIdField,
  ReferenceField,
} from "../../../src/fields";
import { BrokenReference } from "../../../src/relations/broken-reference";
import { Comment, User } from "../../fixtures/models/blog-models";

function validationErrorOf(run: () => unknown): ValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) return error;

    throw error;
  }

  throw new Error("Expected a ValidationError");
}

describe("fields", () => {
  describe("validate()", () => {
    it("should reject missing required values", () => {
      const error = validationErrorOf(() => new CharField({ required: true }).validate(undefined, "name"));

      expect(error).toMatchObject({ field: "name", constraint: "required", message: "name is required." });
    });

    it("should accept missing optional values", () => {
      expect(new CharField().validate(null, "name")).toBeUndefined();
    });

    it("should treat primary keys as required", () => {
      const error = validationErrorOf(() => new EmailField({ primaryKey: true }).validate(undefined, "email"));

      expect(error.constraint).toBe("required");
    });

    it("should reject blank strings when blank is disabled", () => {
      const error = validationErrorOf(() => new CharField({ blank: false }).validate("", "body"));

      expect(error).toMatchObject({ field: "body", constraint: "blank", message: "body cannot be blank." });
    });

    it("should reject values of the wrong type", () => {
      const error = validationErrorOf(() => new CharField().validate(5, "name"));

      expect(error).toMatchObject({ constraint: "type", message: "name must be a valid string.", value: 5 });
    });

    it("should check lengths", () => {
      const field = new CharField({ minLength: 2, maxLength: 3 });

      expect(validationErrorOf(() => field.validate("a", "code")).constraint).toBe("minLength");
      expect(validationErrorOf(() => field.validate("abcd", "code")).message).toBe(
        "code must be at most 3 characters.",
      );
      expect(field.validate("abc", "code")).toBe("abc");
    });

    it("should check choices after the type", () => {
      const field = new CharField({ choices: ["draft", "live"] });

      expect(validationErrorOf(() => field.validate("gone", "status")).message).toBe(
        "status must be one of: draft, live.",
      );
      expect(field.validate("live", "status")).toBe("live");
    });

    it("should run custom validators last", () => {
      const field = new CharField({
        maxLength: 10,
        validators: [
          {
            constraint: "lowercase",
            message: ":field must be lowercase.",
            validate: value => value === value.toLowerCase(),
          },
        ],
      });

      expect(validationErrorOf(() => field.validate("ABCDEFGHIJK", "slug")).constraint).toBe("maxLength");
      expect(validationErrorOf(() => field.validate("ABC", "slug"))).toMatchObject({
        constraint: "lowercase",
        message: "slug must be lowercase.",
      });
    });
  });

  describe("scalar fields", () => {
    it("should check email addresses", () => {
      const field = new EmailField();

      expect(validationErrorOf(() => field.validate("nope", "email")).constraint).toBe("email");
      expect(field.validate("a@example.com", "email")).toBe("a@example.com");
    });

    it("should coerce integers", () => {
      const field = new IntegerField({ min: 0 });

      expect(field.coerce("42")).toBe(42);
      expect(field.coerce(1.5)).toBeUndefined();
      expect(field.coerce("99999999999999999999")).toBeUndefined();
      expect(field.coerce("-9007199254740991")).toBe(-9007199254740991);
      expect(validationErrorOf(() => field.validate(-1, "age")).message).toBe("age must be at least 0.");
    });

    it("should coerce floats", () => {
      const field = new FloatField({ max: 5 });

      expect(field.coerce("2.5")).toBe(2.5);
      expect(field.coerce(Number.NaN)).toBeUndefined();
      expect(validationErrorOf(() => field.validate(5.5, "rating")).constraint).toBe("max");
    });

    it("should only accept booleans", () => {
      const field = new BooleanField();

      expect(field.coerce(false)).toBe(false);
      expect(field.coerce("true")).toBeUndefined();
    });

    it("should coerce dates", () => {
      const field = new DateTimeField();
      const date = field.coerce("2024-01-02T03:04:05.000Z");

      expect(date).toBeInstanceOf(Date);
      expect(date?.getTime()).toBe(Date.UTC(2024, 0, 2, 3, 4, 5));
      expect(field.coerce("not a date")).toBeUndefined();
      expect(field.coerce(new Date(Number.NaN))).toBeUndefined();
    });

    it("should coerce ObjectId strings", () => {
      const field = new ObjectIdField();
      const id = field.coerce("507f1f77bcf86cd799439011");

      expect(id).toBeInstanceOf(ObjectId);
      expect(id?.toHexString()).toBe("507f1f77bcf86cd799439011");
      expect(field.coerce("507f")).toBeUndefined();
    });

    it("should treat empty objects as blank dicts", () => {
      const field = new DictField({ blank: false });

      expect(validationErrorOf(() => field.validate({}, "metadata")).constraint).toBe("blank");
      expect(field.coerce(new ObjectId())).toBeUndefined();
      expect(field.validate({ views: 3 }, "metadata")).toEqual({ views: 3 });
    });
  });

  describe("list fields", () => {
    it("should check the number of items", () => {
      const field = new ListField(new CharField(), { minItems: 1, maxItems: 2 });

      expect(validationErrorOf(() => field.validate([], "tags")).message).toBe(
        "tags must hold at least 1 items.",
      );
      expect(validationErrorOf(() => field.validate(["a", "b", "c"], "tags")).constraint).toBe("maxItems");
    });

    it("should clone list defaults for every instance", () => {
      const field = new ListField(new CharField(), { default: ["news"] });
      const first = field.defaultValue();
      const second = field.defaultValue();

      expect(first).toEqual(["news"]);
      expect(first).not.toBe(second);
    });

    it("should prefer the default factory", () => {
      const field = new IntegerField({ default: 1, defaultFactory: () => 2 });

      expect(field.defaultValue()).toBe(2);
    });
  });

  describe("wire names", () => {
    it("should store primary keys under _id", () => {
      expect(new EmailField({ primaryKey: true, mongoName: "mail" }).wireName("email")).toBe("_id");
    });

    it("should use mongoName when given", () => {
      expect(new DateTimeField({ mongoName: "created_at" }).wireName("createdAt")).toBe("created_at");
      expect(new DateTimeField().wireName("createdAt")).toBe("createdAt");
    });
  });

  describe("reference fields", () => {
    it("should coerce keys through the target primary key", () => {
      const field = new ReferenceField(User);

      expect(field.coerce("a@example.com")).toBe("a@example.com");
      expect(field.coerce(5)).toBeUndefined();
      expect(field.typeName).toBe("reference to User");
    });

    it("should store the primary key of instances and broken references", () => {
      const field = new ReferenceField(User);
      const user = new User({ email: "a@example.com", name: "A" });

      expect(field.toMongo(user)).toBe("a@example.com");
      expect(field.toMongo(new BrokenReference("User", "gone@example.com"))).toBe("gone@example.com");
    });

    it("should reject instances of other models", () => {
      const field = new ReferenceField(User);

      expect(field.coerce(new Comment({ body: "hi" }))).toBeUndefined();
    });

    it("should refuse onDelete on references given by name", () => {
      expect(() => new ReferenceField("User", { onDelete: "cascade" })).toThrow(ModelDefinitionError);
    });

    it("should refuse embedded targets", () => {
      expect(() => new ReferenceField(Comment).target).toThrow(
        "Cannot reference embedded model Comment; use an embedded document field.",
      );
    });
  });
});
