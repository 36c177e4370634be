import { existsSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";

const LOG_PREFIX = "[tidy-paste]";

async function collectTestFiles(dirPath: string): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectTestFiles(entryPath)));
      continue;
    }
    if (!entry.isFile()) {
      continue;
    }
    if (entry.name.endsWith(".test.ts") || entry.name.endsWith(".test.mts")) {
      files.push(entryPath);
    }
  }

  return files;
}

function formatRelative(filePath: string) {
  const rel = path.relative(process.cwd(), filePath);
  return rel.length === 0 ? filePath : rel;
}

// Every workspace package's __tests__ directory, when no directory is given.
async function defaultTestDirs(): Promise<string[]> {
  const packagesDir = path.resolve(process.cwd(), "packages");
  const entries = await fs.readdir(packagesDir, { withFileTypes: true });
  const dirs: string[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const testsDir = path.join(packagesDir, entry.name, "__tests__");
    if (existsSync(testsDir)) {
      dirs.push(testsDir);
    }
  }
  return dirs;
}

async function main() {
  const args = process.argv.slice(2);
  const testsDirs = args.length > 0 ? args.map((arg) => path.resolve(process.cwd(), arg)) : await defaultTestDirs();

  const testFiles: string[] = [];
  for (const dir of testsDirs) {
    testFiles.push(...(await collectTestFiles(dir)));
  }
  testFiles.sort((a, b) => a.localeCompare(b));
  if (testFiles.length === 0) {
    throw new Error(`No test files found under ${testsDirs.map(formatRelative).join(", ") || "packages/*/__tests__"}.`);
  }

  console.log(`${LOG_PREFIX} Running ${testFiles.length} test file(s)...`);

  for (const filePath of testFiles) {
    console.log(`${LOG_PREFIX} → ${formatRelative(filePath)}`);
    await import(pathToFileURL(filePath).href);
  }
}

main().catch((err) => {
  console.error(`${LOG_PREFIX} tests failed:`, err);
  process.exitCode = 1;
});
