import { ViewerError, type ViewerErrorKind } from "./errors.js";

export type DiagnosticLevel = "info" | "warning" | "error";

export interface Diagnostic {
  level: DiagnosticLevel;
  kind?: ViewerErrorKind;
  message: string;
}

export type DiagnosticListener = (entry: Diagnostic) => void;

const MAX_ENTRIES = 5000;

/**
 * Persistent, user-visible log of loading progress and data problems.
 * Entries past the cap are dropped but still reach listeners.
 */
export class DiagnosticLog {
  private list: Diagnostic[] = [];
  private listeners = new Set<DiagnosticListener>();

  info(message: string) {
    this.push({ level: "info", message });
  }

  warn(message: string) {
    this.push({ level: "warning", message });
  }

  report(error: ViewerError) {
    this.push({ level: "error", kind: error.kind, message: error.message });
  }

  entries(): Diagnostic[] {
    return this.list.slice();
  }

  errors(): Diagnostic[] {
    return this.list.filter((e) => e.level === "error");
  }

  subscribe(listener: DiagnosticListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private push(entry: Diagnostic) {
    if (this.list.length < MAX_ENTRIES) this.list.push(entry);
    for (const listener of this.listeners) listener(entry);
  }
}

/** Mirrors entries onto the console; used by the browser entry point. */
export function consoleSink(entry: Diagnostic): void {
  const text = entry.kind ? `[${entry.kind}] ${entry.message}` : entry.message;
  if (entry.level === "error") console.error(text);
  else if (entry.level === "warning") console.warn(text);
  else console.log(text);
}
