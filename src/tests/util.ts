import fsp from "node:fs/promises";
import { join } from "node:path";
import type { ActionExecutor, MirrorFn } from "../executor.js";
import { identified, UNIDENTIFIED, writeMarker } from "../identity.js";
import type { SubdirEntry } from "../scan.js";

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

export type Trees = {
  work: string;
  archive: string;
};

export async function mkCase(tmpBase: string, name: string): Promise<Trees> {
  const base = join(tmpBase, name);
  const work = join(base, "work");
  const archive = join(base, "archive");
  await fsp.mkdir(work, { recursive: true });
  await fsp.mkdir(archive, { recursive: true });
  return { work, archive };
}

/** Create `root/name` holding `files` (relative path → content), optionally marked. */
export async function mkSubdir(
  root: string,
  name: string,
  files: Record<string, string> = {},
  id?: string,
): Promise<string> {
  const dir = join(root, name);
  await fsp.mkdir(dir, { recursive: true });
  for (const [rel, content] of Object.entries(files)) {
    const file = join(dir, rel);
    await fsp.mkdir(join(file, ".."), { recursive: true });
    await fsp.writeFile(file, content);
  }
  if (id !== undefined) {
    await writeMarker(dir, id);
  }
  return dir;
}

/** Every file below `dir` as relative path → content, sorted by path. */
export async function readTree(dir: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  const walk = async (rel: string) => {
    const dirents = await fsp.readdir(join(dir, rel), { withFileTypes: true });
    dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const d of dirents) {
      const childRel = rel ? `${rel}/${d.name}` : d.name;
      if (d.isDirectory()) {
        await walk(childRel);
      } else {
        out[childRel] = await fsp.readFile(join(dir, childRel), "utf8");
      }
    }
  };
  await walk("");
  return out;
}

export async function listDirs(root: string): Promise<string[]> {
  const dirents = await fsp.readdir(root, { withFileTypes: true });
  return dirents
    .filter((d) => d.isDirectory())
    .map((d) => d.name)
    .sort();
}

// in-process stand-in for `rsync -a --delete src/ dest`
export const fsMirror: MirrorFn = async (source, dest, { dryRun }) => {
  if (dryRun) return;
  await fsp.mkdir(dest, { recursive: true });
  for (const name of await fsp.readdir(dest)) {
    await fsp.rm(join(dest, name), { recursive: true, force: true });
  }
  await fsp.cp(source, dest, { recursive: true });
};

export function entry(root: string, name: string, id?: string): SubdirEntry {
  return {
    name,
    identity: id === undefined ? UNIDENTIFIED : identified(id),
    path: `${root}/${name}`,
  };
}

export type ExecutorCall =
  | { op: "mirror"; source: string; dest: string }
  | { op: "rename"; path: string; newName: string }
  | { op: "writeMarker"; path: string; id: string }
  | { op: "assertAbsent"; path: string }
  | { op: "prepare"; source: string; dest: string };

export type RecordingOptions = {
  failMirrorFor?: ReadonlySet<string>;
  failMarkerFor?: ReadonlySet<string>;
  // paths assertAbsent treats as taken
  existing?: ReadonlySet<string>;
};

/** Records every call; ids come out as id-1, id-2, ... */
export class RecordingExecutor implements ActionExecutor {
  readonly calls: ExecutorCall[] = [];
  private counter = 0;

  constructor(private readonly opts: RecordingOptions = {}) {}

  async mirror(source: string, dest: string): Promise<void> {
    this.calls.push({ op: "mirror", source, dest });
    if (this.opts.failMirrorFor?.has(source)) {
      throw new Error(`mirror of ${source} failed`);
    }
  }

  async rename(path: string, newName: string): Promise<string> {
    this.calls.push({ op: "rename", path, newName });
    const parent = path.slice(0, path.lastIndexOf("/"));
    return `${parent}/${newName}`;
  }

  async writeMarker(path: string, id: string): Promise<void> {
    this.calls.push({ op: "writeMarker", path, id });
    if (this.opts.failMarkerFor?.has(path)) {
      throw new Error(`cannot write marker in ${path}`);
    }
  }

  async assertAbsent(path: string): Promise<void> {
    this.calls.push({ op: "assertAbsent", path });
    if (this.opts.existing?.has(path)) {
      throw new Error(`cannot create '${path}': it already exists`);
    }
  }

  generateIdentity(): string {
    this.counter += 1;
    return `id-${this.counter}`;
  }

  async prepare(source: string, dest: string): Promise<void> {
    this.calls.push({ op: "prepare", source, dest });
  }
}
