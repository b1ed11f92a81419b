export class PathNotFoundError extends Error {
  constructor(
    public readonly item: string,
    public readonly candidates: string[],
  ) {
    super(`File not found: ${item}`);
    this.name = 'PathNotFoundError';
    Object.setPrototypeOf(this, PathNotFoundError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      item: this.item,
      candidates: this.candidates,
    };
  }
}
