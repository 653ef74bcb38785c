const PREFIX = "[treebox]";

// Both go to stderr; stdout is reserved for directives and listings.
export function log(...args: unknown[]): void {
  console.error(PREFIX, ...args);
}

export function error(...args: unknown[]): void {
  console.error(PREFIX, ...args);
}
