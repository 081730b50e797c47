/**
 * Output Service Interface
 *
 * Everything a command prints goes through this, so handlers can run
 * against the console or an in-memory recorder.
 */
export interface IOutputService {
  header(title: string, icon?: string): void;
  newline(): void;
  info(message: string): void;
  dim(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** One `label: value` line. */
  field(label: string, value: string | number | boolean): void;
  json(value: unknown): void;
}
