import type { ConfigDocument } from "./schemas";

// Written once by the entry point before the Nest container is built.
let runtimeConfig: ConfigDocument | null = null;

export function setRuntimeConfig(document: ConfigDocument): void {
  runtimeConfig = document;
}

export function getRuntimeConfig(): ConfigDocument | null {
  return runtimeConfig;
}

export function clearRuntimeConfig(): void {
  runtimeConfig = null;
}
