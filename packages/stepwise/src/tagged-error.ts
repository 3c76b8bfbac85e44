/**
 * stepwise/tagged-error
 *
 * Tagged error classes: errors carrying a string discriminant and typed props.
 *
 * @example
 * ```typescript
 * class LabelError extends TaggedError("LabelError", {
 *   message: (p: { label: number }) => `LabelError: label ${p.label} is not installed`,
 * }) {}
 *
 * const error = new LabelError({ label: 3 });
 * error._tag; // "LabelError"
 * error.props.label; // 3
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export interface TaggedErrorOptions<P> {
  /** Builds the error message from the props. Defaults to the tag. */
  message?: (props: P) => string;
}

export interface TaggedErrorCreateOptions {
  /** Underlying error, surfaced as the standard `cause` property. */
  cause?: unknown;
}

export interface TaggedErrorBase<Tag extends string, P> extends Error {
  readonly _tag: Tag;
  readonly props: Readonly<P>;
}

export type TaggedErrorConstructor<Tag extends string, P> = {
  new (props: P, options?: TaggedErrorCreateOptions): TaggedErrorBase<Tag, P>;
  readonly tag: Tag;
};

/** Extract the tag of a tagged error instance. */
export type TagOf<E> = E extends { _tag: infer Tag } ? Tag : never;

/** Extract the props of a tagged error instance. */
export type PropsOf<E> = E extends { props: infer P } ? P : never;

/** Select a member of a tagged error union by its tag. */
export type ErrorByTag<E, Tag extends string> = Extract<E, { _tag: Tag }>;

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a base class for a tagged error.
 *
 * Subclass the returned class to give the error a nominal identity:
 * `class MyError extends TaggedError("MyError", { ... }) {}`.
 */
export function TaggedError<Tag extends string, P extends object = Record<string, never>>(
  tag: Tag,
  options: TaggedErrorOptions<P> = {}
): TaggedErrorConstructor<Tag, P> {
  const format = options.message ?? (() => tag);

  return class extends Error implements TaggedErrorBase<Tag, P> {
    static readonly tag = tag;
    readonly _tag = tag;
    readonly props: Readonly<P>;

    constructor(props: P, createOptions?: TaggedErrorCreateOptions) {
      super(
        format(props),
        createOptions?.cause !== undefined ? { cause: createOptions.cause } : undefined
      );
      this.name = tag;
      this.props = props;
    }
  };
}

// =============================================================================
// Guards
// =============================================================================

/**
 * Checks if a value is a tagged error, optionally with a specific tag.
 */
TaggedError.is = function is(error: unknown, tag?: string): error is TaggedErrorBase<string, unknown> {
  return (
    error instanceof Error &&
    "_tag" in error &&
    typeof error._tag === "string" &&
    (tag === undefined || error._tag === tag)
  );
};
