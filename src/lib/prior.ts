import { spawn } from "node:child_process";
import path from "node:path";
import { fileExists, readText } from "./storage";

/** Previously published rendering of a page, by its path relative to the site root. */
export interface PriorVersionSource {
  readonly description: string;
  read(relativePath: string): Promise<string | null>;
}

export class NoPriorVersionSource implements PriorVersionSource {
  readonly description = "no prior version";

  async read(): Promise<string | null> {
    return null;
  }
}

export class DirectoryPriorVersionSource implements PriorVersionSource {
  constructor(private readonly baseDir: string) {}

  get description(): string {
    return `directory ${this.baseDir}`;
  }

  async read(relativePath: string): Promise<string | null> {
    const filePath = path.join(this.baseDir, relativePath);
    if (!(await fileExists(filePath))) return null;
    return await readText(filePath);
  }
}

export type CommandResult = { code: number | null; stdout: string; stderr: string };

export type CommandRunner = (bin: string, args: string[], cwd: string) => Promise<CommandResult>;

export const spawnRunner: CommandRunner = (bin, args, cwd) =>
  new Promise((resolve, reject) => {
    const child = spawn(bin, args, { cwd, stdio: ["ignore", "pipe", "pipe"] });
    let out = "";
    let err = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (d: string) => (out += d));
    child.stderr.on("data", (d: string) => (err += d));
    child.on("error", (e: Error) => {
      const code = "code" in e ? String(e.code) : "";
      if (code === "ENOENT") return reject(new Error(`${bin} not found (set env "GIT_BIN")`));
      reject(e);
    });
    child.on("close", (code) => resolve({ code, stdout: out, stderr: err }));
  });

const MISSING_OBJECT = /does not exist|exists on disk, but not in|invalid object name|unknown revision|bad revision/i;

export type GitPriorVersionOptions = {
  ref: string;
  cwd?: string;
  /** Directory of the published site inside the ref, e.g. `docs/`. */
  prefix?: string;
  bin?: string;
  run?: CommandRunner;
};

/** Reads published pages with `git show <ref>:<prefix><path>`. */
export class GitPriorVersionSource implements PriorVersionSource {
  private readonly ref: string;
  private readonly cwd: string;
  private readonly prefix: string;
  private readonly bin: string;
  private readonly run: CommandRunner;

  constructor(options: GitPriorVersionOptions) {
    this.ref = options.ref;
    this.cwd = options.cwd ?? process.cwd();
    const prefix = (options.prefix ?? "").replace(/\\/g, "/").replace(/^\.?\/+/, "");
    this.prefix = prefix && !prefix.endsWith("/") ? `${prefix}/` : prefix;
    this.bin = options.bin ?? "git";
    this.run = options.run ?? spawnRunner;
  }

  get description(): string {
    return `git ${this.ref}${this.prefix ? ` (${this.prefix})` : ""}`;
  }

  async read(relativePath: string): Promise<string | null> {
    const object = `${this.ref}:${this.prefix}${relativePath.replace(/\\/g, "/")}`;
    const res = await this.run(this.bin, ["show", object], this.cwd);
    if (res.code === 0) return res.stdout;
    const msg = res.stderr.trim();
    if (MISSING_OBJECT.test(msg)) return null;
    throw new Error(msg ? `git show failed: ${msg}` : `git show failed (code ${res.code})`);
  }
}
