// Error types and formatting

export class ConfigError extends Error {
  userMessage: string;
  line?: number;
  column?: number;

  constructor(message: string, options?: { line?: number; column?: number }) {
    super(message);
    this.name = "ConfigError";
    this.line = options?.line;
    this.column = options?.column;
    this.userMessage = options?.line
      ? `Config error at line ${options.line}, column ${options.column}: ${message}`
      : `Config error: ${message}`;
  }
}

export class ScanError extends Error {
  userMessage: string;
  path: string;

  constructor(dirPath: string, cause: unknown) {
    super(`Cannot read directory ${dirPath}: ${describeCause(cause)}`, {
      cause,
    });
    this.name = "ScanError";
    this.path = dirPath;
    this.userMessage = `Scan failed: ${this.message}`;
  }
}

export class WriteError extends Error {
  userMessage: string;
  path: string;

  constructor(filePath: string, cause: unknown) {
    super(`Cannot write ${filePath}: ${describeCause(cause)}`, { cause });
    this.name = "WriteError";
    this.path = filePath;
    this.userMessage = `Write failed: ${this.message}`;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const code = errorCode(cause);
    return code ? `${code} (${cause.message})` : cause.message;
  }
  return String(cause);
}

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
