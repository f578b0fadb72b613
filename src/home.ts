import { existsSync } from "fs";
import { resolve, dirname, join } from "path";

const HOME_DIRNAME = ".recollect";

function findWorkDir(): string {
  let dir = process.cwd();
  for (let i = 0; i < 20; i++) {
    if (existsSync(resolve(dir, HOME_DIRNAME))) return dir;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return process.cwd();
}

let _homeDir: string | null = null;

export function getHomeDir(): string {
  if (!_homeDir) {
    const override = process.env.RECOLLECT_HOME?.trim();
    _homeDir = override ? resolve(override) : join(findWorkDir(), HOME_DIRNAME);
  }
  return _homeDir;
}
