import { ObjectId } from "mongodb";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DocumentCodec } from "../../../src/codec/document-codec";
import { resetDatabaseConfigurations, setDatabaseConfigurations } from "../../../src/config";
import { dataSourceRegistry } from "../../../src/data-source/data-source-registry";
import { BrokenReferenceError } from "../../../src/errors/broken-reference.error";
import { CharField, ReferenceField } from "../../../src/fields";
import { BrokenReference } from "../../../src/relations/broken-reference";
import { dereference, dereferenceId } from "../../../src/relations/dereferencer";
import { defineModel } from "../../../src/utils/define-model";
import { Comment, CommentWrapper, Post, ReadingList, User } from "../../fixtures/models/blog-models";
import type { MemoryCollection } from "../../helpers/memory-collection";
import { registerMemoryDataSource } from "../../helpers/memory-data-source";

const Article = defineModel({
  name: "Article",
  fields: {
    title: new CharField({ primaryKey: true }),
    author: new ReferenceField(User),
  },
});

describe("dereference", () => {
  let users: MemoryCollection;
  let posts: MemoryCollection;

  beforeEach(() => {
    const source = registerMemoryDataSource();

    users = source.collection("user");
    posts = source.collection("post");
    users.documents = [
      { _id: "a@example.com", name: "A" },
      { _id: "b@example.com", name: "B" },
    ];
  });

  afterEach(() => {
    dataSourceRegistry.clear();
    resetDatabaseConfigurations();
  });

  it("should swap stored keys for instances on demand", async () => {
    await new User({ email: "c@example.com", name: "C" }).save();

    const author = await User.objects.get({ email: "c@example.com" });

    await new Article({ title: "T", author }).save();

    const article = await Article.objects.get({ _id: "T" });

    expect(article.get("author")).toBe("c@example.com");

    await article.dereference();

    const resolved = article.get("author");

    expect(resolved).toBeInstanceOf(User);
    expect(resolved instanceof User ? resolved.get("name") : undefined).toBe("C");
  });

  it("should query each referenced model once", async () => {
    const find = vi.spyOn(users, "find");
    const list = [
      new Post({ title: "1", author: "a@example.com" }),
      new Post({ title: "2", author: "b@example.com" }),
      new Post({ title: "3", author: "a@example.com" }),
    ];

    await dereference(list);

    expect(find).toHaveBeenCalledTimes(1);
    expect(find.mock.calls[0][0]).toEqual({ _id: { $in: ["a@example.com", "b@example.com"] } });
    expect(list[0].get("author")).toBe(list[2].get("author"));
    expect(users.cursors[0].closed).toBe(true);
  });

  it("should not query again for resolved references", async () => {
    const find = vi.spyOn(users, "find");
    const post = new Post({ title: "1", author: "a@example.com" });

    await dereference(post);
    await dereference(post);

    expect(find).toHaveBeenCalledTimes(1);
  });

  it("should not query when there is nothing to resolve", async () => {
    const find = vi.spyOn(users, "find");

    await dereference([]);
    await dereference(new Post({ title: "No author" }));

    expect(find).not.toHaveBeenCalled();
  });

  it("should resolve only the selected paths", async () => {
    const post = new Post({
      title: "Nested",
      author: "a@example.com",
      comments: [new Comment({ body: "Top", author: "a@example.com" })],
      wrapper: new CommentWrapper({
        comments: [new Comment({ body: "Deep", author: "b@example.com" })],
      }),
    });

    await dereference(post, { fields: ["wrapper.comments.author"] });

    const deep = post.get("wrapper")?.get("comments")?.[0].get("author");

    expect(deep).toBeInstanceOf(User);
    expect(post.get("comments")?.[0].get("author")).toBe("a@example.com");
    expect(post.get("author")).toBe("a@example.com");
  });

  it("should resolve lists of references in place", async () => {
    const first = new ObjectId();
    const second = new ObjectId();

    posts.documents = [
      { _id: first, title: "First" },
      { _id: second, title: "Second" },
    ];

    const list = new ReadingList({ slug: "mine", posts: [first, second, first] });

    await list.dereference("posts");

    const [one, two, three] = list.get("posts") ?? [];

    expect(one).toBeInstanceOf(Post);
    expect(two instanceof Post ? two.get("title") : undefined).toBe("Second");
    expect(three).toBe(one);
  });

  describe("missing targets", () => {
    it("should put a broken reference in the field", async () => {
      const post = new Post({ title: "Orphan", author: "gone@example.com" });

      await dereference(post);

      const author = post.get("author");

      expect(author).toBeInstanceOf(BrokenReference);
      expect(author).toEqual(new BrokenReference("User", "gone@example.com"));
      expect(new DocumentCodec().encode(post).author).toBe("gone@example.com");
    });

    it("should throw in strict mode before changing anything", async () => {
      const list = [
        new Post({ title: "Kept", author: "a@example.com" }),
        new Post({ title: "Orphan", author: "gone@example.com" }),
      ];

      await expect(dereference(list, { strict: true })).rejects.toThrow(
        'Referenced User with id "gone@example.com" does not exist.',
      );
      expect(list[0].get("author")).toBe("a@example.com");
    });

    it("should follow the configured policy", async () => {
      setDatabaseConfigurations({ brokenReferences: "strict" });

      await expect(dereference(new Post({ title: "Orphan", author: "gone@example.com" }))).rejects.toBeInstanceOf(
        BrokenReferenceError,
      );
    });
  });

  describe("dereferenceId()", () => {
    it("should load one instance by primary key", async () => {
      const user = await dereferenceId(User, "b@example.com");

      expect(user?.get("name")).toBe("B");
      expect(await dereferenceId(User, "gone@example.com")).toBeNull();
    });

    it("should coerce the id through the primary key field", async () => {
      const id = new ObjectId();

      posts.documents = [{ _id: id, title: "By id" }];

      const post = await dereferenceId(Post.definition, id.toHexString());

      expect(post?.get("title")).toBe("By id");
    });
  });
});
