import type { Model } from "../model/model";
import type { ModelReference } from "../model/types";
import { EmbeddedDocumentField } from "./embedded-document-field";
import { ListField, type ListFieldOptions } from "./list-field";

/**
 * Shorthand for a list of embedded documents.
 */
export class EmbeddedDocumentListField<TModel extends Model = Model> extends ListField<TModel> {
  public constructor(model: ModelReference<TModel>, options: ListFieldOptions<TModel> = {}) {
    super(new EmbeddedDocumentField<TModel>(model), options);
  }
}
