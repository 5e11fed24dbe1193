export class MissingContentRootError extends Error {
  readonly contentDir: string;

  constructor(contentDir: string) {
    super(`Content directory not found: ${contentDir}`);
    this.name = "MissingContentRootError";
    this.contentDir = contentDir;
  }
}

export class TemplateResolutionError extends Error {
  readonly templatePath: string;

  constructor(templatePath: string, templateDir: string) {
    super(`Template "${templatePath}" not found in ${templateDir}`);
    this.name = "TemplateResolutionError";
    this.templatePath = templatePath;
  }
}

export class OutputPreparationError extends Error {
  readonly outputDir: string;

  constructor(outputDir: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not prepare output directory ${outputDir}: ${reason}`, { cause });
    this.name = "OutputPreparationError";
    this.outputDir = outputDir;
  }
}

export class ConfigError extends Error {
  readonly configPath: string;

  constructor(configPath: string, reason: string) {
    super(`Invalid site configuration in ${configPath}: ${reason}`);
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

export class TemplateExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TemplateExecutionError";
  }
}

/** Raised when scaffolding would overwrite existing files. */
export class ScaffoldError extends Error {
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${message}: ${path}`);
    this.name = "ScaffoldError";
    this.path = path;
  }
}
