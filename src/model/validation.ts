import {
  literal,
  number,
  object,
  pipe,
  safeInteger,
  safeParse,
  string,
  transform,
  variant,
  type BaseIssue,
  type InferOutput,
} from "valibot";
import { MalformedOperation } from "../errors";
import { asAuthorId, asEntryId, asTimestamp, type AuthorId } from "../types/brands";
import type { Operation } from "./operation";

// -0 and 0 share a Map key, so ids are normalised to one of them.
export const idSchema = pipe(
  number(),
  safeInteger(),
  transform((n) => n + 0),
);

const base = {
  entryId: idSchema,
  authorId: idSchema,
  timestamp: idSchema,
};

export const operationSchema = variant("kind", [
  object({ kind: literal("addName"), ...base, name: string() }),
  object({ kind: literal("removeName"), ...base }),
  object({ kind: literal("markDone"), ...base }),
  object({ kind: literal("markUndone"), ...base }),
]);

export type OperationInput = InferOutput<typeof operationSchema>;

const describe = (issues: readonly BaseIssue<unknown>[]) =>
  issues
    .map((i) => {
      const path = i.path?.map((p) => String(p.key)).join(".");
      return path ? `${path}: ${i.message}` : i.message;
    })
    .join("; ");

/**
 * Validates and brands an untrusted operation. Failure is a contract
 * violation, not a recoverable error.
 */
export const parseOperation = (input: unknown): Operation => {
  const result = safeParse(operationSchema, input);
  if (!result.success) {
    throw new MalformedOperation(`malformed operation: ${describe(result.issues)}`);
  }
  const op = result.output;
  return {
    ...op,
    entryId: asEntryId(op.entryId),
    authorId: asAuthorId(op.authorId),
    timestamp: asTimestamp(op.timestamp),
  };
};

export const parseAuthorId = (input: unknown): AuthorId => {
  const result = safeParse(idSchema, input);
  if (!result.success) {
    throw new MalformedOperation(`malformed author id: ${describe(result.issues)}`);
  }
  return asAuthorId(result.output);
};
