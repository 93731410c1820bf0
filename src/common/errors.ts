// common/errors.ts
// Construction-time failures. Runtime conditions (collision, cap exhaustion,
// journey completion) are simulation state, never exceptions.

export class NetworkDefinitionError extends Error {
  readonly roadIndex: number | null;

  constructor(message: string, roadIndex: number | null = null) {
    super(message);
    this.name = "NetworkDefinitionError";
    this.roadIndex = roadIndex;
  }
}

export class ConfigLoadError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Failed to load config ${path}: ${message}`);
    this.name = "ConfigLoadError";
    this.path = path;
  }
}
