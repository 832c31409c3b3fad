export class ToolError extends Error {
  constructor(
    message: string,
    public originalError?: unknown,
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

export class BinaryNotFoundError extends ToolError {
  constructor(
    public binary: string,
    searched: string[] = [],
  ) {
    super(searched.length ? `${binary} not found (searched: ${searched.join(', ')})` : `${binary} not found`);
    this.name = 'BinaryNotFoundError';
  }
}

export class CommandSpawnError extends ToolError {
  constructor(
    public command: string,
    originalError?: unknown,
  ) {
    const reason = originalError instanceof Error ? originalError.message : String(originalError);
    super(`Failed to start ${command}: ${reason}`, originalError);
    this.name = 'CommandSpawnError';
  }
}
