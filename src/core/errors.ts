export type TreeErrorCode =
  | "STALE_HANDLE"
  | "ROOT_EXISTS"
  | "SELF_APPEND"
  | "CYCLE"
  | "ALIASED_PAIR";

/** Caller-logic failure raised by the arena or the tree. */
export class TreeError extends Error {
  readonly code: TreeErrorCode;

  constructor(code: TreeErrorCode, message: string) {
    super(message);
    this.name = "TreeError";
    this.code = code;
  }
}
