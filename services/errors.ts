export class InputFileNotFoundError extends Error {
  constructor(readonly filePath: string) {
    super(`Excel file ${filePath} does not exist`);
    this.name = "InputFileNotFoundError";
  }
}
