/**
 * CLI option shapes, as commander hands them to each action
 */

export interface CheckCommandOptions {
  notice: string;
  last4: string;
  verbose?: boolean;
  headful?: boolean;
  /** False when --no-screenshots is given */
  screenshots: boolean;
  artifactsDir?: string;
  timeoutMs?: number;
}

export interface ServeCommandOptions {
  port?: number;
  artifactsDir?: string;
  verbose?: boolean;
}

export interface FetchPdfCommandOptions {
  timeoutMs?: number;
  verbose?: boolean;
}
