import { FieldContainer } from "./field_container.ts";
import type { Value } from "./value.ts";

/**
 * Plain storage for the fields of a sub-struct that was merged into its
 * parent's fixed layout.
 */
export class FieldRecord extends FieldContainer {
  readonly #fields = new Map<string, Value>();

  protected override fieldMap(): Map<string, Value> {
    return this.#fields;
  }
}
