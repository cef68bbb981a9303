import { ObjectId } from "mongodb";
import { describe, expect, it } from "vitest";
import { QueryTranslationError } from "../../../src/errors/query-translation.error";
import { UpdateTranslator } from "../../../src/query/update-translator";
import { Post, ReadingList, User } from "../../fixtures/models/blog-models";

describe("UpdateTranslator", () => {
  const posts = new UpdateTranslator(Post.definition);
  const user = new User({ email: "a@example.com", name: "A" });

  it("should translate $set through the field schema", () => {
    expect(posts.translate({ $set: { title: "New", createdAt: "2024-01-01T00:00:00.000Z" } })).toEqual({
      $set: { title: "New", created_at: new Date(Date.UTC(2024, 0, 1)) },
    });
  });

  it("should store references set by instance", () => {
    expect(posts.translate({ $set: { author: user } })).toEqual({ $set: { author: "a@example.com" } });
  });

  it("should keep numeric operators", () => {
    expect(new UpdateTranslator(User.definition).translate({ $inc: { age: 1 }, $mul: { age: 2 } })).toEqual({
      $inc: { age: 1 },
      $mul: { age: 2 },
    });
  });

  it("should translate $unset and $rename paths", () => {
    expect(posts.translate({ $unset: { createdAt: "" }, $rename: { title: "metadata.title" } })).toEqual({
      $unset: { created_at: "" },
      $rename: { title: "metadata.title" },
    });
  });

  it("should encode list elements for $push and $addToSet", () => {
    expect(posts.translate({ $push: { tags: { $each: ["a", "b"], $slice: -5 } } })).toEqual({
      $push: { tags: { $each: ["a", "b"], $slice: -5 } },
    });

    const post = new Post({ title: "Saved" });
    const id = new ObjectId();
    post.pk = id;

    expect(new UpdateTranslator(ReadingList.definition).translate({ $addToSet: { posts: post } })).toEqual({
      $addToSet: { posts: id },
    });
  });

  it("should translate $pull conditions against embedded documents", () => {
    expect(posts.translate({ $pull: { comments: { author: user } } })).toEqual({
      $pull: { comments: { author: "a@example.com" } },
    });
    expect(posts.translate({ $pull: { tags: { $in: ["old"] } }, $pullAll: { tags: ["stale"] } })).toEqual({
      $pull: { tags: { $in: ["old"] } },
      $pullAll: { tags: ["stale"] },
    });
  });

  describe("errors", () => {
    it("should require at least one operator", () => {
      expect(() => posts.translate({})).toThrow("An update needs at least one operator.");
    });

    it("should refuse plain fields and unknown operators", () => {
      expect(() => posts.translate({ title: "x" })).toThrow('Updates only take operators, got the field "title".');
      expect(() => posts.translate({ $foo: { title: "x" } })).toThrow('Unknown update operator "$foo".');
    });

    it("should refuse malformed operands", () => {
      expect(() => posts.translate({ $set: 5 })).toThrow("$set expects an object of fields.");
      expect(() => new UpdateTranslator(User.definition).translate({ $inc: { age: "1" } })).toThrow(
        '$inc of "age" expects a number.',
      );
      expect(() => posts.translate({ $push: { title: "x" } })).toThrow(
        '$push needs a list field, "title" is not one.',
      );
      expect(() => posts.translate({ $rename: { title: 1 } })).toThrow(
        '$rename of "title" expects the new field name.',
      );
    });

    it("should refuse values the field cannot hold", () => {
      expect(() => posts.translate({ $set: { published: "yes" } })).toThrow(QueryTranslationError);
      expect(() => posts.translate({ $set: { subtitle: "x" } })).toThrow(QueryTranslationError);
    });
  });
});
