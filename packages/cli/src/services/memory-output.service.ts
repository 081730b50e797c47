import type { IOutputService } from "../interfaces/output.interface";

export type OutputKind =
  | "header"
  | "newline"
  | "info"
  | "dim"
  | "success"
  | "warn"
  | "error"
  | "field"
  | "json";

export interface OutputEntry {
  kind: OutputKind;
  text: string;
}

/** Records uncoloured output lines; used for scripting and tests. */
export class MemoryOutputService implements IOutputService {
  readonly entries: OutputEntry[] = [];

  header(title: string, icon?: string): void {
    this.push("header", icon ? `${icon} ${title}` : title);
  }

  newline(): void {
    this.push("newline", "");
  }

  info(message: string): void {
    this.push("info", message);
  }

  dim(message: string): void {
    this.push("dim", message);
  }

  success(message: string): void {
    this.push("success", message);
  }

  warn(message: string): void {
    this.push("warn", message);
  }

  error(message: string): void {
    this.push("error", message);
  }

  field(label: string, value: string | number | boolean): void {
    this.push("field", `${label}: ${String(value)}`);
  }

  json(value: unknown): void {
    this.push("json", JSON.stringify(value, null, 2));
  }

  /** Texts of the entries of one kind, in order. */
  linesOf(kind: OutputKind): string[] {
    return this.entries.filter((entry) => entry.kind === kind).map((entry) => entry.text);
  }

  private push(kind: OutputKind, text: string): void {
    this.entries.push({ kind, text });
  }
}
