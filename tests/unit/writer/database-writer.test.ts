import { MongoServerError, ObjectId } from "mongodb";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resetDatabaseConfigurations } from "../../../src/config";
import { dataSourceRegistry } from "../../../src/data-source/data-source-registry";
import { OperationError } from "../../../src/errors/operation.error";
import { ValidationError } from "../../../src/errors/validation.error";
import { ReferenceField } from "../../../src/fields";
import { defineModel } from "../../../src/utils/define-model";
import { DatabaseWriter } from "../../../src/writer/database-writer";
import { Comment, Post, ReadingList, User } from "../../fixtures/models/blog-models";
import type { MemoryCollection } from "../../helpers/memory-collection";
import { registerMemoryDataSource } from "../../helpers/memory-data-source";
import { createMockCollection } from "../../helpers/mock-driver";

const Bookmark = defineModel({
  name: "Bookmark",
  fields: { post: new ReferenceField(Post) },
  cascade: true,
});

describe("DatabaseWriter", () => {
  let users: MemoryCollection;
  let posts: MemoryCollection;
  let lists: MemoryCollection;

  beforeEach(() => {
    const source = registerMemoryDataSource();

    users = source.collection("user");
    posts = source.collection("post");
    lists = source.collection("reading_list");
  });

  afterEach(() => {
    dataSourceRegistry.clear();
    resetDatabaseConfigurations();
  });

  describe("save()", () => {
    it("should insert instances without a primary key", async () => {
      const post = await new Post({ title: "Hello" }).save();

      expect(post.pk).toBeInstanceOf(ObjectId);
      expect(posts.documents).toEqual([{ _id: post.pk, title: "Hello", tags: [], published: false }]);
    });

    it("should replace the stored document once saved", async () => {
      const post = await new Post({ title: "Hello" }).save();

      post.set("title", "Changed");
      await post.save();

      expect(posts.documents).toHaveLength(1);
      expect(posts.documents[0].title).toBe("Changed");
    });

    it("should upsert instances with a declared primary key", async () => {
      const user = new User({ email: "a@example.com", name: "A" });

      await user.save();
      user.set("age", 30);
      await user.save();

      expect(users.documents).toEqual([{ _id: "a@example.com", name: "A", age: 30 }]);
    });

    it("should insert anyway when forced", async () => {
      await new User({ email: "a@example.com", name: "A" }).save();

      await expect(
        new DatabaseWriter(new User({ email: "a@example.com", name: "Again" })).save({ forceInsert: true }),
      ).rejects.toBeInstanceOf(MongoServerError);
    });

    it("should not write invalid instances", async () => {
      const insertOne = vi.spyOn(posts, "insertOne");

      await expect(new Post().save()).rejects.toBeInstanceOf(ValidationError);
      expect(insertOne).not.toHaveBeenCalled();
    });

    it("should skip checks when fullClean is off", async () => {
      const post = await new Post().save({ fullClean: false });

      expect(posts.documents).toEqual([{ _id: post.pk, tags: [], published: false }]);
    });

    it("should refuse embedded instances", async () => {
      await expect(new DatabaseWriter(new Comment({ body: "Hi" })).save()).rejects.toThrow(
        new OperationError("Cannot save embedded Comment on its own; save the document holding it."),
      );
    });

    it("should write to the resolved collection", async () => {
      const collection = createMockCollection("post");
      const post = new Post({ title: "Elsewhere" });

      await new DatabaseWriter(post, () => collection).save();

      expect(collection.insertOne).toHaveBeenCalledWith({ title: "Elsewhere", tags: [], published: false });
      expect(post.pk).toBe("id-1");
      expect(posts.documents).toEqual([]);
    });
  });

  describe("cascade", () => {
    it("should refuse unsaved references without cascade", async () => {
      const list = new ReadingList({ slug: "mine", posts: [new Post({ title: "Draft" })] });

      await expect(list.save()).rejects.toMatchObject({ constraint: "reference-unsaved" });
      expect(posts.documents).toEqual([]);
    });

    it("should save referenced instances first", async () => {
      const author = new User({ email: "a@example.com", name: "A" });
      const post = new Post({ title: "Draft", author });
      const list = new ReadingList({ slug: "mine", owner: author, posts: [post] });

      await list.save({ cascade: true });

      expect(post.pk).toBeInstanceOf(ObjectId);
      expect(users.documents).toEqual([{ _id: "a@example.com", name: "A" }]);
      expect(posts.documents).toHaveLength(1);
      expect(lists.documents[0]).toMatchObject({ owner: "a@example.com", posts: [post.pk], slug: "mine" });
    });

    it("should check the instance before saving anything", async () => {
      const list = new ReadingList({ posts: [new Post({ title: "Draft" })] });
      list.setValue("slug", 42);

      await expect(list.save({ cascade: true })).rejects.toMatchObject({ field: "slug", constraint: "type" });
      expect(posts.documents).toEqual([]);
    });

    it("should stop when a referenced instance is invalid", async () => {
      const list = new ReadingList({ slug: "mine", posts: [new Post()] });

      await expect(list.save({ cascade: true })).rejects.toMatchObject({ field: "title" });
      expect(lists.documents).toEqual([]);
    });

    it("should follow the model cascade option", async () => {
      const post = new Post({ title: "Linked" });

      await new Bookmark({ post }).save();

      expect(post.pk).toBeInstanceOf(ObjectId);
      expect(posts.documents).toHaveLength(1);
    });
  });

  describe("model helpers", () => {
    it("should reload stored values", async () => {
      const post = await new Post({ title: "Local" }).save();

      posts.documents[0].title = "Remote";
      posts.documents[0].published = true;
      post.set("tags", ["unsaved"]);

      await post.refreshFromDb(["title"]);

      expect(post.get("title")).toBe("Remote");
      expect(post.get("published")).toBe(false);
      expect(post.get("tags")).toEqual(["unsaved"]);

      await post.refreshFromDb();

      expect(post.get("published")).toBe(true);
      expect(post.get("tags")).toEqual([]);
    });

    it("should refuse to reload unsaved instances", async () => {
      await expect(new Post({ title: "New" }).refreshFromDb()).rejects.toThrow(
        "Cannot refresh Post: the instance has not been saved yet.",
      );
    });

    it("should delete the stored document", async () => {
      const list = await new ReadingList({ slug: "mine" }).save();

      expect(await list.delete()).toBe(1);
      expect(lists.documents).toEqual([]);
    });

    it("should compare instances by primary key", () => {
      const first = new User({ email: "a@example.com", name: "A" });
      const second = new User({ email: "a@example.com", name: "Other" });

      expect(first.equals(second)).toBe(true);
      expect(first.equals(new User({ email: "b@example.com" }))).toBe(false);
      expect(new Post({ title: "Same" }).equals(new Post({ title: "Same" }))).toBe(true);
      expect(first.equals(new ReadingList())).toBe(false);
    });

    it("should not treat null primary keys as the same key", () => {
      const left = new User({ name: "A" }).setValue("email", null);
      const right = new User({ name: "B" }).setValue("email", null);

      expect(left.equals(right)).toBe(false);
    });

    it("should check fields without storage", () => {
      expect(() => new User({ email: "not-an-email", name: "A" }).fullClean()).toThrow(
        "email must be a valid email address.",
      );
      expect(new User({ email: "a@example.com", name: "A" }).toDocument()).toEqual({
        _id: "a@example.com",
        name: "A",
      });
    });
  });
});
