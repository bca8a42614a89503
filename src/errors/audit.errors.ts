export class FileCheckError extends Error {
  readonly repository: string;
  readonly path: string;

  constructor(repository: string, path: string, detail: string) {
    super(`Could not check ${path || "<tree>"} in ${repository}: ${detail}`);
    this.name = "FileCheckError";
    this.repository = repository;
    this.path = path;
  }
}

export class NoOrganizationsError extends Error {
  constructor(detail: string) {
    super(`No organizations to audit: ${detail}`);
    this.name = "NoOrganizationsError";
  }
}
