import { Schema } from "effect";

export class InputTooLargeError extends Schema.TaggedError<InputTooLargeError>()(
  "InputTooLargeError",
  {
    side: Schema.Literal("original", "modified"),
    length: Schema.Number,
    limit: Schema.Number,
  }
) {
  get message() {
    return `The ${this.side} text has ${this.length} characters; split it into parts of at most ${this.limit} characters.`;
  }
}
