import { spawnSync } from 'node:child_process';
import { existsSync, readdirSync } from 'node:fs';
import { join, resolve } from 'node:path';

/** Map of test categories to filename suffix filters. Unit tests carry no category suffix. */
const categories = {
  unit: ['.test.ts'],
  integration: ['.integration.test.ts'],
  acceptance: ['.acceptance.test.ts']
} as const;

/** Suffixes that mark a file as belonging to a non-unit category. */
const categorySuffixes = ['.integration.test.ts', '.acceptance.test.ts'];

/** Valid test category names. */
type Category = keyof typeof categories;

/** Selected category from CLI args. */
const arg = process.argv[2];

function isCategory(value: string | undefined): value is Category {
  return value !== undefined && value in categories;
}

if (!isCategory(arg)) {
  const allowed = Object.keys(categories).join(', ');
  console.error(`Usage: tsx scripts/run-tests.ts <category>\nCategories: ${allowed}`);
  process.exit(1);
}

const category: Category = arg;
/** File suffixes to match for the selected category. */
const suffixes: readonly string[] = categories[category];
/** Root folders to scan for tests. */
const roots = ['src', 'host'];

function matches(name: string): boolean {
  if (category === 'unit' && categorySuffixes.some((suffix) => name.endsWith(suffix))) return false;
  return suffixes.some((suffix) => name.endsWith(suffix));
}

/** Collected test file paths for the selected category. */
const files: string[] = [];

/** Recursively scan a directory and collect matching test files. */
function walk(dir: string): void {
  if (!existsSync(dir)) return;
  const entries = readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(fullPath);
      continue;
    }
    if (entry.isFile() && matches(entry.name)) files.push(fullPath);
  }
}

for (const root of roots) walk(resolve(root));

if (!files.length) {
  console.error(`No test files found for category "${category}".`);
  process.exit(1);
}

const vitestBin = resolve(
  'node_modules',
  '.bin',
  process.platform === 'win32' ? 'vitest.cmd' : 'vitest'
);

const result = spawnSync(vitestBin, ['run', ...files], { stdio: 'inherit' });
if (result.error) {
  console.error(result.error.message);
  process.exit(1);
}
process.exit(result.status ?? 1);
