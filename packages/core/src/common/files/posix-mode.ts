/**
 * POSIX `st_mode` bits (as in <sys/stat.h>)
 *
 * Only the file-type field and the owner execute bit are interpreted;
 * permission bits are otherwise carried as is.
 */
export const PosixMode = {
  /** Mask for the file-type field */
  S_IFMT: 0o170000,
  S_IFSOCK: 0o140000,
  S_IFLNK: 0o120000,
  S_IFREG: 0o100000,
  S_IFBLK: 0o060000,
  S_IFDIR: 0o040000,
  S_IFCHR: 0o020000,
  S_IFIFO: 0o010000,
  /** Owner execute permission */
  S_IXUSR: 0o000100,
} as const;

export function isRegularFileMode(mode: number): boolean {
  return (mode & PosixMode.S_IFMT) === PosixMode.S_IFREG;
}

export function isDirectoryMode(mode: number): boolean {
  return (mode & PosixMode.S_IFMT) === PosixMode.S_IFDIR;
}

export function isSymlinkMode(mode: number): boolean {
  return (mode & PosixMode.S_IFMT) === PosixMode.S_IFLNK;
}
