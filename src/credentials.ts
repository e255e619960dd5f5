import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { CredentialProvider } from "./types.js";

const execFileAsync = promisify(execFile);

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { encoding: "utf8" });
  return stdout;
};

/**
 * Reads the dashboard login from a 1Password item through the `op` CLI.
 * The item needs `username` and `password` fields; a one-time password
 * field is optional.
 */
export class OnePasswordCredentials implements CredentialProvider {
  constructor(
    private readonly vault: string,
    private readonly item: string,
    private readonly run: CommandRunner = runCommand
  ) {}

  getEmail(): Promise<string> {
    return this.read("username");
  }

  getPassword(): Promise<string> {
    return this.read("password");
  }

  async getOtp(): Promise<string | null> {
    try {
      const out = await this.run("op", ["item", "get", this.item, "--vault", this.vault, "--otp"]);
      return out.trim() || null;
    } catch (err) {
      console.warn(`⚠️  No one-time code available from '${this.item}': ${commandFailure(err)}`);
      return null;
    }
  }

  private async read(field: string): Promise<string> {
    const ref = `op://${this.vault}/${this.item}/${field}`;
    let out: string;
    try {
      out = await this.run("op", ["read", ref]);
    } catch (err) {
      throw new Error(`op read failed for '${ref}': ${commandFailure(err)}`, { cause: err });
    }
    const value = out.trim();
    if (!value) {
      throw new Error(`op read returned an empty value for '${ref}'`);
    }
    return value;
  }
}

function commandFailure(err: unknown): string {
  if (err && typeof err === "object" && "stderr" in err) {
    if (typeof err.stderr === "string" && err.stderr.trim()) return err.stderr.trim();
  }
  return err instanceof Error ? err.message : String(err);
}
