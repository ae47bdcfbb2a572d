/**
 * Store Errors
 *
 * Every store operation fails with a tagged error whose `kind` callers can
 * switch on. The scope says which layer raised it.
 */

export const STORE_ERROR_KINDS = [
  "NotFound",
  "NotDirectory",
  "InvalidPath",
  "Utf8Error",
  "NameMismatch",
  "OverwriteError",
  "IoError",
  "SerializationError",
  "DecodeError",
] as const;

export type StoreErrorKind = (typeof STORE_ERROR_KINDS)[number];

export type StoreScope = "web" | "page" | "attachment" | "version";

/** Filesystem failures recognised by errno code */
export type FsErrorKind = "NotFound" | "NotDirectory" | "OverwriteError" | "IoError";

export class StoreError<K extends StoreErrorKind = StoreErrorKind> extends Error {
  readonly kind: K;
  readonly scope: StoreScope;

  constructor(scope: StoreScope, kind: K, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreError";
    this.scope = scope;
    this.kind = kind;
  }
}

export class WebError<K extends StoreErrorKind = StoreErrorKind> extends StoreError<K> {
  constructor(kind: K, message: string, options?: ErrorOptions) {
    super("web", kind, message, options);
    this.name = "WebError";
  }
}

export class PageError<K extends StoreErrorKind = StoreErrorKind> extends StoreError<K> {
  constructor(kind: K, message: string, options?: ErrorOptions) {
    super("page", kind, message, options);
    this.name = "PageError";
  }
}

export class VersionError<K extends StoreErrorKind = StoreErrorKind> extends StoreError<K> {
  constructor(kind: K, message: string, options?: ErrorOptions) {
    super("version", kind, message, options);
    this.name = "VersionError";
  }
}

export class AttachmentError<K extends StoreErrorKind = StoreErrorKind> extends StoreError<K> {
  constructor(kind: K, message: string, options?: ErrorOptions) {
    super("attachment", kind, message, options);
    this.name = "AttachmentError";
  }
}

export function isStoreError(err: unknown): err is StoreError {
  return err instanceof StoreError;
}

/**
 * Read the errno code off a Node.js filesystem error
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Classify a filesystem failure
 */
export function fsErrorKind(err: unknown): FsErrorKind {
  switch (errnoCode(err)) {
    case "ENOENT":
      return "NotFound";
    case "ENOTDIR":
      return "NotDirectory";
    case "EEXIST":
      return "OverwriteError";
    default:
      return "IoError";
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

type ErrorFactory<E extends StoreError> = new (kind: FsErrorKind, message: string, options?: ErrorOptions) => E;

/**
 * Wrap a filesystem failure in the given store error class, keeping the
 * original error as the cause.
 */
export function fromFsError<E extends StoreError>(
  ErrorClass: ErrorFactory<E>,
  err: unknown,
  context: string
): E {
  return new ErrorClass(fsErrorKind(err), `${context}: ${describe(err)}`, { cause: err });
}
