export const S_IFMT = 0o170000;
export const S_IFDIR = 0o040000;
export const S_IFREG = 0o100000;

const HOST_UNIX = 3;
const HOST_DARWIN = 19;
const DOS_READONLY = 0x01;
const DOS_DIRECTORY = 0x10;

/**
 * POSIX mode for a central directory record. Unix hosts store the mode in
 * the high half of the external attributes; everything else gets a mode
 * derived from the DOS attribute bits.
 */
export function entryMode(madeBy: number, externalAttributes: number, name: string): number {
  const host = madeBy >>> 8;
  const namedDir = name.endsWith('/');
  if (host === HOST_UNIX || host === HOST_DARWIN) {
    const mode = (externalAttributes >>> 16) & 0xffff;
    if (mode !== 0) {
      if (namedDir) return (mode & ~S_IFMT) | S_IFDIR;
      if ((mode & S_IFMT) === 0) return mode | S_IFREG;
      return mode;
    }
  }
  if (namedDir || (externalAttributes & DOS_DIRECTORY) !== 0) {
    return S_IFDIR | 0o777;
  }
  return S_IFREG | ((externalAttributes & DOS_READONLY) !== 0 ? 0o444 : 0o666);
}

export function isDirectoryMode(mode: number): boolean {
  return (mode & S_IFMT) === S_IFDIR;
}
