import fs from 'fs';

/** Text of a file under tests/fixtures. */
export function readFixture(name: string): string {
  return fs.readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf-8');
}
