export class ContentAnalyzerError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
  ) {
    super(message);
    this.name = 'ContentAnalyzerError';
    Object.setPrototypeOf(this, ContentAnalyzerError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      filePath: this.filePath,
    };
  }
}
