/**
 * Fatal scaffold failure: the root cannot be used at all.
 *
 * Raised by the pre-flight check before any category is touched.
 */
export class RootUnwritableError extends Error {
  constructor(
    public readonly root: string,
    public readonly reason: string,
  ) {
    super(`Root ${root} is not writable: ${reason}`);
    this.name = "RootUnwritableError";
  }
}
