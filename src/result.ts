import { Effect, Either } from "effect";
import type { AdminClientError } from "./errors";

/** `Right` carries the value, `Left` the failure. */
export type Result<A> = Either.Either<A, AdminClientError>;

export const runResult = <A>(effect: Effect.Effect<A, AdminClientError>): Promise<Result<A>> =>
  Effect.runPromise(Effect.either(effect));

export const unwrapOrThrow = async <A>(result: Result<A> | Promise<Result<A>>): Promise<A> => {
  const resolved = await result;
  if (Either.isLeft(resolved)) {
    throw resolved.left;
  }
  return resolved.right;
};
