import { ValidationError } from "../errors/validation.error";
import { CharField } from "./char-field";

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class EmailField extends CharField {
  public readonly typeName: string = "email address";

  protected checkConstraints(value: string, path: string): void {
    super.checkConstraints(value, path);

    if (!EMAIL_PATTERN.test(value)) {
      throw new ValidationError(path, "email", `${path} must be a valid email address.`, value);
    }
  }
}
