import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { vi } from "vitest";
import { createLogger, type LogSink } from "../logger";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "hourbook-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(file, "utf8"));
}

export async function writeJson(file: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(value, null, 2), "utf8");
}

export interface TestClock {
  now: () => Date;
  advance(seconds: number): void;
  set(iso: string): void;
}

export function createClock(start = "2024-01-01T09:00:00.000Z"): TestClock {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance(seconds: number) {
      current += seconds * 1000;
    },
    set(iso: string) {
      current = Date.parse(iso);
    },
  };
}

export function sequentialIds(prefix = "id"): () => string {
  let counter = 0;
  return () => `${prefix}-${++counter}`;
}

export function recordingLogger() {
  const sink = vi.fn<LogSink>();
  return { sink, logger: createLogger({ level: "debug", sink }) };
}
