import { execFile } from "node:child_process";
import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { delimiter, join } from "node:path";

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export type CommandResult = {
  success: boolean;
  stdout: string;
  stderr: string;
  returnCode: number;
  command: string;
};

export type CommandRunner = (argv: readonly string[], options: { timeoutSeconds: number }) => Promise<CommandResult>;

export type ExecutableLookup = (binary: string) => Promise<boolean>;

/**
 * Runs a command without a shell. Never rejects: spawn failures, timeouts and
 * non-zero exits are all reported through the result.
 */
export const runCommand: CommandRunner = (argv, options) =>
  new Promise((resolve) => {
    const command = argv.join(" ");
    const [file, ...args] = argv;

    if (!file) {
      resolve({ success: false, stdout: "", stderr: "Empty command", returnCode: -1, command });
      return;
    }

    execFile(
      file,
      args,
      {
        encoding: "utf8",
        timeout: options.timeoutSeconds * 1000,
        maxBuffer: MAX_OUTPUT_BYTES,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ success: true, stdout, stderr, returnCode: 0, command });
          return;
        }

        if (error.code === "ENOENT") {
          resolve({ success: false, stdout: "", stderr: `Command not found: ${file}`, returnCode: -1, command });
          return;
        }

        if (error.killed) {
          resolve({ success: false, stdout, stderr: "Command timed out", returnCode: -1, command });
          return;
        }

        if (typeof error.code === "number") {
          resolve({ success: false, stdout, stderr, returnCode: error.code, command });
          return;
        }

        resolve({ success: false, stdout, stderr: stderr || error.message, returnCode: -1, command });
      }
    );
  });

export const findExecutable: ExecutableLookup = async (binary) => {
  const directories = (process.env.PATH ?? "").split(delimiter).filter(Boolean);

  for (const directory of directories) {
    try {
      await access(join(directory, binary), constants.X_OK);
      return true;
    } catch {
      continue;
    }
  }

  return false;
};
