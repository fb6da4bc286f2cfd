import { readFile, realpath, stat } from "node:fs/promises";
import path from "node:path";

export type ResolveTextInputOptions = {
  /** Directory relative paths are resolved against (defaults to `process.cwd()`). */
  cwd?: string;
  encoding?: BufferEncoding;
};

export type ResolvedTextInput = {
  text: string;
  /** File the text was read from, `null` when the input was the text itself. */
  path: string | null;
};

export type ParsedTextInvocation<TSpec> = ResolvedTextInput & {
  spec: TSpec;
};

/**
 * Reads `input` as a file when it names one inside the nearest git root (or `cwd` outside a
 * repository); multi-line text, inline JSON and names of missing files are returned as given.
 */
export async function resolveTextInput(
  input: string,
  options: ResolveTextInputOptions = {},
): Promise<ResolvedTextInput> {
  if (/[\r\n]/.test(input) || /^\s*[[{]/.test(input)) {
    return { text: input, path: null };
  }

  const cwd = path.resolve(options.cwd ?? process.cwd());
  const inputPath = path.resolve(cwd, input);

  let inputStats: Awaited<ReturnType<typeof stat>>;
  try {
    inputStats = await stat(inputPath);
  } catch (error) {
    if (isErrorWithCode(error) && (error.code === "ENOENT" || error.code === "ENAMETOOLONG")) {
      return { text: input, path: null };
    }
    throw error;
  }

  if (!inputStats.isFile()) {
    throw new Error(`Input path is not a file: ${inputPath}`);
  }

  const repoRoot = await findNearestGitRepoRoot(cwd);
  const boundary = repoRoot ?? cwd;
  const canonicalBoundary = await resolveCanonicalPath(boundary);
  const canonicalInputPath = await resolveCanonicalPath(inputPath);
  if (!isPathWithinBase(canonicalBoundary, canonicalInputPath)) {
    if (repoRoot) {
      throw new Error(
        `Input path resolves outside repository root: input=${inputPath} repoRoot=${repoRoot}.`,
      );
    }
    throw new Error(`Input path resolves outside cwd: input=${inputPath} cwd=${cwd}.`);
  }

  return { text: await readFile(inputPath, options.encoding ?? "utf8"), path: inputPath };
}

/** Resolves `input` and parses the text; parse errors name the file they came from. */
export async function parseTextInvocation<TSpec>(
  input: string,
  options: ResolveTextInputOptions,
  parseSpec: (text: string) => TSpec,
): Promise<ParsedTextInvocation<TSpec>> {
  const resolved = await resolveTextInput(input, options);
  try {
    return { ...resolved, spec: parseSpec(resolved.text) };
  } catch (error) {
    if (resolved.path === null || !(error instanceof Error)) {
      throw error;
    }
    throw new Error(`${resolved.path}: ${error.message}`, { cause: error });
  }
}

function isErrorWithCode(error: unknown): error is { code: string } {
  return typeof error === "object" && error !== null && "code" in error;
}

async function findNearestGitRepoRoot(startDirectory: string): Promise<string | null> {
  let current = path.resolve(startDirectory);

  while (true) {
    try {
      await stat(path.join(current, ".git"));
      return current;
    } catch {
      // Not a repository root; keep walking up.
    }

    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

function isPathWithinBase(basePath: string, candidatePath: string): boolean {
  const relativePath = path.relative(basePath, candidatePath);
  if (relativePath.length === 0) {
    return true;
  }
  return (
    !path.isAbsolute(relativePath) &&
    relativePath !== ".." &&
    !relativePath.startsWith(`..${path.sep}`)
  );
}

async function resolveCanonicalPath(filePath: string): Promise<string> {
  try {
    return await realpath(filePath);
  } catch (error) {
    if (isErrorWithCode(error) && error.code === "ENOENT") {
      return path.resolve(filePath);
    }
    throw error;
  }
}
