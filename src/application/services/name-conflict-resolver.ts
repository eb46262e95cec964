import path from 'node:path';

import type { FileSystemPort } from '../ports/file-system.port';
import { siblingName } from '../../domain/sibling-name';
import type { NameKind } from '../../domain/sibling-name';

export class NameConflictResolver {
  public constructor(private readonly fileSystem: FileSystemPort) { }

  /**
   * Return targetPath if it is free, else the first free "_2", "_3", ... sibling.
   * Checked against the live filesystem on every call.
   */
  public async resolve(targetPath: string, kind: NameKind): Promise<string> {
    if (!(await this.fileSystem.exists(targetPath))) {
      return targetPath;
    }

    const parent = path.dirname(targetPath);
    const name = path.basename(targetPath);

    let counter = 2;
    while (true) {
      const candidate = path.join(parent, siblingName(name, counter, kind));
      if (!(await this.fileSystem.exists(candidate))) {
        return candidate;
      }
      counter += 1;
    }
  }
}
