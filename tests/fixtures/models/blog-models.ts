import {
  BooleanField,
  CharField,
  DateTimeField,
  DictField,
  EmailField,
  EmbeddedDocumentField,
  EmbeddedDocumentListField,
  IntegerField,
  ListField,
  ReferenceField,
} from "../../../src/fields";
import { DeleteRule } from "../../../src/model/delete-rules";
import { defineEmbeddedModel, defineModel } from "../../../src/utils/define-model";

/**
 * Fixture: users keyed by email
 */
export const User = defineModel({
  name: "User",
  fields: {
    email: new EmailField({ primaryKey: true }),
    name: new CharField({ required: true, maxLength: 50 }),
    age: new IntegerField({ min: 0 }),
  },
});

/**
 * Fixture: embedded comment pointing at its author
 */
export const Comment = defineEmbeddedModel({
  name: "Comment",
  fields: {
    body: new CharField({ required: true, blank: false }),
    author: new ReferenceField(User),
  },
});

/**
 * Fixture: embedded document holding a list of comments
 */
export const CommentWrapper = defineEmbeddedModel({
  name: "CommentWrapper",
  fields: {
    comments: new EmbeddedDocumentListField(Comment),
  },
});

/**
 * Fixture: posts with an ObjectId primary key, deleted with their author
 */
export const Post = defineModel({
  name: "Post",
  fields: {
    title: new CharField({ required: true }),
    author: new ReferenceField(User, { onDelete: DeleteRule.Cascade }),
    tags: new ListField(new CharField(), { default: [] }),
    comments: new EmbeddedDocumentListField(Comment),
    wrapper: new EmbeddedDocumentField(CommentWrapper),
    published: new BooleanField({ default: false }),
    createdAt: new DateTimeField({ mongoName: "created_at" }),
    metadata: new DictField(),
  },
  indexes: [{ key: { author: 1, createdAt: -1 } }],
});

/**
 * Fixture: reading lists, pulled from when a post is deleted
 */
export const ReadingList = defineModel({
  name: "ReadingList",
  fields: {
    owner: new ReferenceField(User, { onDelete: DeleteRule.Nullify }),
    posts: new ListField(new ReferenceField(Post, { onDelete: DeleteRule.Pull }), { default: [] }),
    slug: new CharField({ unique: true }),
  },
});
