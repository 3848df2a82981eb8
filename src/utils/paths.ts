import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

/**
 * True when the module at `moduleUrl` is the script Node was started with
 * (directly, or through a symlinked bin such as the one npm installs).
 */
export function isMainModule(moduleUrl: string, entry: string | undefined = process.argv[1]): boolean {
  if (!entry) {
    return false;
  }

  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    // Entry point that doesn't exist on disk (e.g. `node -e`)
    return false;
  }
}
