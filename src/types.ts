/**
 * Shared types and interfaces for the export-prune CLI
 */

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Options parsed from the command line. Anything left undefined falls back to
 * the environment, then to the config file.
 */
export interface GlobalOptions {
  /** Export directory to prune */
  sourcePath?: string;
  /** Destination directory for the pruned export */
  targetPath?: string;
  /** Team tags to keep */
  tags?: string[];
  /** Overwrite existing destination files */
  overwrite?: boolean;
  /** Do not copy metastore exports */
  skipMetastore?: boolean;
  /** Do not copy artifact subtrees */
  skipArtifacts?: boolean;
  /** Explicit config file path */
  config?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

export type OutputFormat = 'human' | 'json';

/**
 * Command execution context
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  /** Working directory used to locate the default config file */
  cwd: string;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
  /** Process exit code the CLI should use */
  exitCode: ExitCode;
}

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  success: 0,
  failure: 1,
  sourceNotFound: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
