import fs from 'fs';
import os from 'os';
import path from 'path';
import fg from 'fast-glob';
import { resolveFirst, Candidate } from '../util/resolver';

export interface ToolchainResult {
  directory: string | null;
  tried: string[];
}

export const DEFAULT_COMPILER = 'riscv32-esp-elf-g++';

export const platformioPackagesDir = (home = os.homedir()) => path.join(home, '.platformio', 'packages');

// newer toolchain releases first, then the unversioned install
export const DEFAULT_TOOLCHAIN_PATTERNS = [
  '~/.platformio/packages/toolchain-riscv32-esp@14*/bin',
  '~/.platformio/packages/toolchain-riscv32-esp@src-*/bin',
  '~/.platformio/packages/toolchain-riscv32-esp/bin',
];

export const expandHome = (pattern: string, home = os.homedir()): string => {
  if (pattern === '~') return home;
  if (pattern.startsWith('~/')) return path.join(home, pattern.slice(2));
  return pattern;
};

const isFile = async (file: string) => {
  try {
    return (await fs.promises.stat(file)).isFile();
  } catch {
    return false;
  }
};

// fast-glob only understands forward slashes
const toGlob = (pattern: string) => pattern.replace(/\\/g, '/');

const compilerCandidate = (pattern: string, compiler: string, home?: string): Candidate<string> => ({
  location: pattern,
  resolve: async () => {
    const matches = await fg(toGlob(expandHome(pattern, home)), {
      onlyDirectories: true,
      absolute: true,
    });
    // highest release first when a pattern matches several installs
    matches.sort().reverse();
    for (const dir of matches) {
      if (await isFile(path.join(dir, compiler))) return path.normalize(dir);
    }
    return null;
  },
});

/**
 * Returns the first directory matching one of the patterns (in pattern order)
 * that holds the compiler executable.
 */
export const findCompiler = async (
  patterns: string[] = DEFAULT_TOOLCHAIN_PATTERNS,
  compiler: string = DEFAULT_COMPILER,
  home?: string,
): Promise<ToolchainResult> => {
  const { value, tried } = await resolveFirst(patterns.map((pattern) => compilerCandidate(pattern, compiler, home)));
  return { directory: value, tried };
};

// installed packages whose names contain the keyword, for diagnostics when no toolchain matched
export const listPackages = async (packagesDir: string, keyword = 'riscv'): Promise<string[]> => {
  try {
    const entries = await fs.promises.readdir(packagesDir);
    return entries.filter((entry) => entry.toLowerCase().includes(keyword.toLowerCase())).sort();
  } catch {
    return [];
  }
};

export const prependPath = (dir: string, current = process.env.PATH || ''): string => (
  current ? `${dir}${path.delimiter}${current}` : dir
);
