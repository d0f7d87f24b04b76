export class InternalAssertError extends Error {
  name = "InternalAssertError";
}

export class GraphLintError extends Error {
  name = "GraphLintError";
}

/**
 * Abort on a broken IR or pass invariant. These are programming errors:
 * nothing inside the package catches them.
 */
export function internalAssert(
  condition: unknown,
  message: string | (() => string),
): asserts condition {
  if (!condition) {
    throw new InternalAssertError(
      typeof message === "function" ? message() : message,
    );
  }
}
