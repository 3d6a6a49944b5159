/**
 * Process runner — executes an external tool and streams its output.
 */

import { spawn } from "node:child_process";
import { createInterface } from "node:readline";

export type OutputLineHandler = (line: string, stream: "stdout" | "stderr") => void;

export interface ProcessRunner {
  /** Resolves with the exit code; rejects when the process cannot start. */
  run(command: string, args: readonly string[], onLine?: OutputLineHandler): Promise<number>;
}

export const spawnRunner: ProcessRunner = {
  run(command, args, onLine) {
    return new Promise<number>((resolvePromise, reject) => {
      const child = spawn(command, [...args], { stdio: ["ignore", "pipe", "pipe"] });

      if (onLine) {
        createInterface({ input: child.stdout }).on("line", (line) => onLine(line, "stdout"));
        createInterface({ input: child.stderr }).on("line", (line) => onLine(line, "stderr"));
      } else {
        child.stdout.resume();
        child.stderr.resume();
      }

      child.on("error", (error) => reject(new Error(`Failed to start ${command}: ${error.message}`)));
      child.on("close", (code, signal) => {
        resolvePromise(code ?? (signal ? 128 : 1));
      });
    });
  },
};
