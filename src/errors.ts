export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidColorError extends GenerationError {
  constructor(readonly color: string, readonly validNames: string[], reason?: string) {
    super(`Invalid color: ${color}, ${reason ?? `not a known color name, available colors: ${validNames.join(', ')}`}`);
  }
}

export class IOError extends GenerationError {
  constructor(readonly path: string, action: string, cause?: unknown) {
    super(`Could not ${action} ${path}: ${cause instanceof Error ? cause.message : String(cause ?? 'unknown error')}`, { cause });
  }
}

export class RasterizationError extends GenerationError {
  constructor(
    readonly svgPath: string,
    readonly outPath: string,
    readonly exitCode: number|null,
    readonly stderr: string,
    cause?: unknown,
  ) {
    const detail = stderr.trim() || (cause instanceof Error ? cause.message : '');
    super(`Rasterizing ${svgPath} -> ${outPath} failed${exitCode != null ? ` (exit ${exitCode})` : ''}${detail ? `: ${detail}` : ''}`, { cause });
  }
}
