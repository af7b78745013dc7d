import { existsSync } from "node:fs";

/**
 * Cursor names project folders after the workspace path with `/`, `\` and `.`
 * all replaced by `-`:
 *
 *   /Users/jane.doe/projects/my-api -> Users-jane-doe-projects-my-api
 *   C:\Users\jane\my-api            -> c-Users-jane-my-api
 *
 * Since `-` is also a legal filename character, decoding has to guess, and it
 * uses the filesystem to confirm guesses.
 */

export type ExistsFn = (path: string) => boolean;

export interface PathResolverOptions {
  exists?: ExistsFn;
  platform?: NodeJS.Platform;
}

const SEPARATOR = "-";
const RESERVED_ROOT = "var-";

/**
 * Past this many encoded parts in one component, only the `.` join is tried.
 * Without it a name of n parts with nothing on disk yields 2^(n-1) candidates.
 */
export const MAX_COMPONENT_PARTS = 8;

export class PathResolver {
  private readonly existsFn: ExistsFn;
  private readonly platform: NodeJS.Platform;
  private readonly memo = new Map<string, boolean>();

  constructor(options: PathResolverOptions = {}) {
    this.existsFn = options.exists ?? existsSync;
    this.platform = options.platform ?? process.platform;
  }

  /** Forget every cached existence answer. */
  reset(): void {
    this.memo.clear();
  }

  /**
   * Decode an encoded folder name into a best-guess absolute path.
   * Candidates confirmed on disk win; otherwise the result depends only on
   * the name (boundary, then dot, then literal dash).
   */
  decode(name: string): string {
    if (name.startsWith(RESERVED_ROOT)) {
      return "/" + name.replace(/-/g, "/");
    }

    const parts = name.split(SEPARATOR);
    if (parts.length === 1) return "/" + name;

    const drive = this.detectDrive(parts);
    if (drive) {
      return this.solve(parts, 2, parts[1] ?? "", 1, drive);
    }
    return this.solve(parts, 1, parts[0] ?? "", 1, "/");
  }

  private exists(path: string): boolean {
    const cached = this.memo.get(path);
    if (cached !== undefined) return cached;
    const result = this.existsFn(path);
    this.memo.set(path, result);
    return result;
  }

  // `c-Users-...` from Git Bash / MSYS, or any name on Windows
  private detectDrive(parts: string[]): string | undefined {
    const first = parts[0] ?? "";
    if (parts.length < 2 || !/^[a-z]$/i.test(first)) return undefined;
    const drive = first.toUpperCase() + ":/";
    if (
      this.platform === "win32" ||
      this.exists(drive) ||
      this.exists("/" + first)
    ) {
      return drive;
    }
    return undefined;
  }

  /**
   * `segment` is the component being built from `joined` encoded parts;
   * `prefix` is everything before it and always ends in `/`.
   */
  private solve(
    parts: string[],
    idx: number,
    segment: string,
    joined: number,
    prefix: string,
  ): string {
    if (idx >= parts.length) return prefix + segment;

    const part = parts[idx] ?? "";
    const asDash = joined < MAX_COMPONENT_PARTS
      ? this.solve(parts, idx + 1, segment + "-" + part, joined + 1, prefix)
      : undefined;
    const asDot = this.solve(parts, idx + 1, segment + "." + part, joined + 1, prefix);

    const candidate = prefix + segment;
    const asBoundary = this.exists(candidate)
      ? this.solve(parts, idx + 1, part, 1, candidate + "/")
      : undefined;

    for (const result of [asBoundary, asDot, asDash]) {
      if (result !== undefined && this.exists(result)) return result;
    }
    return asBoundary ?? asDot;
  }
}

/** One-shot decode with a fresh resolver. */
export function decodeFolderName(
  name: string,
  options?: PathResolverOptions,
): string {
  return new PathResolver(options).decode(name);
}
