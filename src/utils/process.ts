import { spawn } from "child_process";

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

/**
 * Run an external tool to completion. Rejects when the binary cannot be
 * started or exits non-zero, with whatever the tool printed.
 */
export function runProcess(command: string, args: string[]): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args);

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (error) => {
      reject(new Error(`${command} could not be started: ${error.message}`));
    });

    child.on("close", (code) => {
      if (code !== 0) {
        const output = (stderr || stdout).trim();
        return reject(new Error(`${command} exited with code ${code}${output ? `: ${output}` : ""}`));
      }
      resolve({ stdout, stderr });
    });
  });
}
