import { basename, extname } from 'node:path';

/**
 * Derive a platform name from a signature file name.
 *
 * `Nintendo - Game Boy (20240101-000000).dat` -> `Nintendo - Game Boy`
 * `Sega - Mega Drive.dat` -> `Sega - Mega Drive`
 */
export function platformFromFilename(filename: string): string {
  const name = basename(filename);
  const openIndex = name.indexOf('(');
  if (openIndex === -1) {
    return stripExtension(name).trim();
  }
  return name.slice(0, openIndex).trim();
}

export function stripExtension(filename: string): string {
  const ext = extname(filename);
  return ext ? filename.slice(0, -ext.length) : filename;
}
