import type { Context } from "hono";
import { ValidationError, summarizeError } from "../errors.js";

/** Parse the request body as JSON; malformed bodies are a validation failure. */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (err) {
    throw new ValidationError("Request body must be valid JSON", [
      { path: "", message: summarizeError(err) },
    ]);
  }
}
