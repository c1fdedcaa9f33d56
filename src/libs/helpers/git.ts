import Debug from "debug";
import { execFile } from "node:child_process";
import { promisify } from "node:util";

const debug = Debug("helper:git");
const execFileAsync = promisify(execFile);

// Runs git with the given arguments and returns its stdout
export type GitRunner = (args: string[]) => Promise<string>;

export const createGitRunner =
  (cwd: string = process.cwd()): GitRunner =>
  async (args) => {
    debug(`git ${args.join(" ")}`);
    const { stdout } = await execFileAsync("git", args, { cwd, maxBuffer: 16 * 1024 * 1024 });
    return stdout;
  };

export type TagSource = () => Promise<string[]>;

export const gitTagSource =
  (git: GitRunner = createGitRunner()): TagSource =>
  async () =>
    (await git(["tag"]))
      .split(/\r?\n/)
      .map((tag) => tag.trim())
      .filter((tag) => tag.length > 0);

export interface TagSwitch {
  previousBranch: string;
  stashed: boolean;
}

// Checks out `tag`, stashing uncommitted changes first.
// The returned state tells how to get back to where we were.
export async function switchToTag(git: GitRunner, tag: string): Promise<TagSwitch> {
  const previousBranch = (await git(["branch", "--show-current"])).trim();
  const pending = await git(["status", "--porcelain"]);
  const stashed = pending.trim().length > 0;
  if (stashed) {
    await git(["stash"]);
  }
  await git(["checkout", tag]);
  debug(`Switched from ${previousBranch || "detached HEAD"} to ${tag} (stashed: ${stashed})`);
  return { previousBranch, stashed };
}
