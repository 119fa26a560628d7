/** A value a template may reference. */
export type TemplateValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | TemplateValue[]
  | { [key: string]: TemplateValue };

export type TemplateContext = Record<string, TemplateValue>;

export interface SyncSettings {
  backup_enabled: boolean;
  backup_suffix: string;
  /** Carried for config compatibility; sync never prompts. */
  confirm_overwrite: boolean;
  /** Patterns relative to the skill root; a trailing `/` marks a directory. */
  files_to_sync: string[];
}

export interface ValidationSettings {
  required_files: string[];
  required_frontmatter: string[];
  executable_files: string[];
}

export interface SkillConfig {
  sync: SyncSettings;
  validation: ValidationSettings;
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface BackupRecord {
  original: string;
  backup: string;
}

export interface SyncResult {
  success: boolean;
  copiedFiles: readonly string[];
  skippedFiles: readonly SkippedFile[];
  backups: readonly BackupRecord[];
  errors: readonly string[];
}

export interface ValidationResult {
  valid: boolean;
  errors: readonly string[];
  warnings: readonly string[];
  info: readonly string[];
}

export interface HandlerResult<T = Record<string, unknown>> {
  success: boolean;
  message?: string;
  error?: string;
  data?: T;
}

export interface HandlerOptions {
  configPath?: string;
  templateDir?: string;
  now?: () => Date;
}
