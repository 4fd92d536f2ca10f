import { fileURLToPath } from 'node:url';

/**
 * Absolute path of a .proto file shipped beside this module
 */
export function protoPath(file: string): string {
  return fileURLToPath(new URL(`./${file}`, import.meta.url));
}
