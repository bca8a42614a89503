export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid scan-drift configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

export class ConfigFileNotFoundError extends Error {
  constructor(path: string) {
    super(`Config file not found: ${path}. Run \`scan-drift init\` to create one.`);
    this.name = "ConfigFileNotFoundError";
  }
}
