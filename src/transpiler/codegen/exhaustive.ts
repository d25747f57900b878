/**
 * Exhaustive type checking utility.
 *
 * Used in the default branch of a switch over a node's `kind`: when every
 * case is handled the argument has type `never`, and a missing case becomes
 * a compile error.
 */

import { CodeGenError } from "../../common/error.ts";

export function assertNever(x: never, msg?: string): never {
  throw new CodeGenError(msg ?? `Unhandled case: ${JSON.stringify(x)}`, "unknown");
}
