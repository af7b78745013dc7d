export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ProjectsDirNotFoundError extends Error {
  constructor(readonly projectsDir: string) {
    super(`Projects directory not found: ${projectsDir}`);
    this.name = "ProjectsDirNotFoundError";
  }
}
