/**
 * Configuration schema types for the reuseify CLI
 */

/**
 * External tool locations
 */
export interface ToolsConfigSchema {
  /** reuse executable (name on PATH or absolute path) */
  reuse: string;
  /** git executable */
  git: string;
  /** Working directory for every tool call (repository root) */
  cwd: string;
}

/**
 * get-authors settings
 */
export interface AuthorsConfigSchema {
  /** Artifact path to write */
  output: string;
  /** Keep files without git history, with an empty author list */
  includeNotInGit: boolean;
  /** Extra exclusion globs, on top of the built-in ones */
  exclude: string[];
  /** Resolve author names through .mailmap (%aN instead of %an) */
  useMailmap: boolean;
}

/**
 * annotate settings
 */
export interface AnnotateConfigSchema {
  /** Artifact path to read */
  input: string;
  /** Contributors used for entries without authors */
  defaultContributors: string[];
  /** Skip entries whose file no longer exists instead of calling reuse */
  checkFilesExist: boolean;
}

/**
 * Terminal output settings
 */
export interface OutputConfigSchema {
  /** Colored output */
  color: boolean;
  /** Print every file as it is processed */
  verbose: boolean;
}

/**
 * Complete reuseify configuration
 */
export interface ReuseifyConfig {
  tools: ToolsConfigSchema;
  authors: AuthorsConfigSchema;
  annotate: AnnotateConfigSchema;
  output: OutputConfigSchema;
}

/**
 * Configuration with every section and field optional (config files, env)
 */
export interface PartialReuseifyConfig {
  tools?: Partial<ToolsConfigSchema>;
  authors?: Partial<AuthorsConfigSchema>;
  annotate?: Partial<AnnotateConfigSchema>;
  output?: Partial<OutputConfigSchema>;
}

/**
 * CLI options from command line arguments, shared by both commands
 */
export interface CliOptions {
  /** Path to config file */
  config?: string;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Disable colored output */
  noColor?: boolean;
  /** Print every file as it is processed */
  verbose?: boolean;

  // get-authors
  /** Artifact path to write */
  output?: string;
  /** Keep untracked files */
  includeNotInGit?: boolean;
  /** Extra exclusion globs */
  exclude?: string[];

  // annotate
  /** Artifact path to read */
  input?: string;
  /** Contributors for entries without authors */
  defaultContributors?: string[];
  /** Tokens forwarded verbatim to every `reuse annotate` call */
  passthrough?: string[];
}
