/**
 * Environment interface
 * Abstracts process-wide lookups (environment variables, home directory,
 * working directory, directory probes) so root resolution can be exercised
 * without touching the real process state.
 */

import { existsSync, statSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';

export interface Environment {
  /**
   * Read an environment variable; undefined when unset
   */
  getVar(name: string): string | undefined;

  /**
   * The user's home directory, if one is known
   */
  homeDir(): string | undefined;

  /**
   * The current working directory
   */
  cwd(): string;

  /**
   * Whether a path exists at all
   */
  exists(path: string): boolean;

  /**
   * Whether a path exists and is a directory
   */
  isDirectory(path: string): boolean;
}

/**
 * Environment backed by the running process and the real filesystem
 */
export class SystemEnvironment implements Environment {
  getVar(name: string): string | undefined {
    return process.env[name];
  }

  homeDir(): string | undefined {
    const home = homedir();
    return home === '' ? undefined : home;
  }

  cwd(): string {
    return process.cwd();
  }

  exists(path: string): boolean {
    return existsSync(path);
  }

  isDirectory(path: string): boolean {
    try {
      return statSync(path).isDirectory();
    } catch {
      return false;
    }
  }
}

/**
 * Options for a StaticEnvironment
 */
export interface StaticEnvironmentOptions {
  vars?: Record<string, string>;
  homeDir?: string;
  cwd?: string;
  /** Directories that exist (absolute paths); their parents are implied */
  directories?: string[];
}

/**
 * Fixed, in-memory environment for tests
 */
export class StaticEnvironment implements Environment {
  private readonly vars: Record<string, string>;
  private readonly home?: string;
  private readonly workingDirectory: string;
  private readonly directories: Set<string> = new Set();

  constructor(options: StaticEnvironmentOptions = {}) {
    this.vars = { ...options.vars };
    this.home = options.homeDir;
    this.workingDirectory = options.cwd ?? '/';
    for (const dir of options.directories ?? []) {
      this.addDirectory(dir);
    }
  }

  getVar(name: string): string | undefined {
    return this.vars[name];
  }

  homeDir(): string | undefined {
    return this.home;
  }

  cwd(): string {
    return this.workingDirectory;
  }

  exists(path: string): boolean {
    return this.isDirectory(path);
  }

  isDirectory(path: string): boolean {
    return this.directories.has(this.normalize(path));
  }

  private addDirectory(path: string): void {
    let current = this.normalize(path);
    while (!this.directories.has(current)) {
      this.directories.add(current);
      const parent = resolve(current, '..');
      if (parent === current) {
        break;
      }
      current = parent;
    }
  }

  private normalize(path: string): string {
    return resolve(this.workingDirectory, path);
  }
}

/**
 * Create the environment used when none is injected
 */
export function createSystemEnvironment(): Environment {
  return new SystemEnvironment();
}
