import { Types } from "mongoose";
import { InvalidArgumentError } from "../errors.js";

const HEX_ID = /^[0-9a-f]{24}$/i;

/**
 * Store record identifier. Ids this service assigns wrap a bson ObjectId;
 * records written by other tools may carry any other `_id`, kept as its string
 * form. Clients always see the string.
 */
export class DocumentId {
  private constructor(readonly key: Types.ObjectId | string) {}

  static generate(): DocumentId {
    return new DocumentId(new Types.ObjectId());
  }

  /** Parse a client-supplied id. Throws InvalidArgumentError on anything but 24 hex characters. */
  static parse(text: string): DocumentId {
    if (!HEX_ID.test(text)) {
      throw new InvalidArgumentError(`Invalid id: ${text}`);
    }
    return new DocumentId(new Types.ObjectId(text.toLowerCase()));
  }

  /** Wrap an `_id` read back from the store, whatever its type. */
  static fromStored(value: unknown): DocumentId {
    return new DocumentId(value instanceof Types.ObjectId ? value : String(value));
  }

  equals(other: DocumentId): boolean {
    if (this.key instanceof Types.ObjectId && other.key instanceof Types.ObjectId) {
      return this.key.equals(other.key);
    }
    return typeof this.key === typeof other.key && this.toString() === other.toString();
  }

  toString(): string {
    return this.key instanceof Types.ObjectId ? this.key.toHexString() : this.key;
  }

  toJSON(): string {
    return this.toString();
  }
}
