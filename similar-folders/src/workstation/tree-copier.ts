import fs from 'fs/promises';

/**
 * Copies a folder tree on top of another
 */
export type TreeCopier = (source: string, destination: string) => Promise<void>;

/**
 * Copies the contents of `source` into `destination`: entries with the same name
 * are overwritten, entries only in `destination` stay. Symlinks are copied as
 * links, never followed.
 */
export const copyTreeOnto: TreeCopier = async (source, destination) => {
  await fs.cp(source, destination, {
    recursive: true,
    force: true,
    errorOnExist: false,
    verbatimSymlinks: true
  });
};
