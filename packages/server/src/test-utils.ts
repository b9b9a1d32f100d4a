import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

/** Directory layout: a nested object is a directory, a string is file contents */
export interface TreeLayout {
  [name: string]: TreeLayout | string;
}

export async function makeTree(layout: TreeLayout): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'treeport-'));
  await writeTree(root, layout);
  return root;
}

async function writeTree(dir: string, layout: TreeLayout): Promise<void> {
  for (const [name, value] of Object.entries(layout)) {
    const target = path.join(dir, name);
    if (typeof value === 'string') {
      await fs.writeFile(target, value);
    } else {
      await fs.mkdir(target);
      await writeTree(target, value);
    }
  }
}

/** `count` files named by `name(i)` */
export function files(count: number, name: (i: number) => string): TreeLayout {
  const layout: TreeLayout = {};
  for (let i = 0; i < count; i++) {
    layout[name(i)] = '';
  }
  return layout;
}

export async function removeTree(root: string): Promise<void> {
  await fs.rm(root, { recursive: true, force: true });
}
