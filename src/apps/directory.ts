import { join, resolve } from 'path';
import { readdir, stat } from 'fs/promises';
import { errnoCode } from '../errors.js';

const APP_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

/**
 * Generated apps live in one directory each, named by slug:
 * "My News Website" -> "my_news_website".
 */
export function slugifyAppName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^[_-]+|[_-]+$/g, '');
}

export function isValidAppName(name: string): boolean {
  return APP_NAME_PATTERN.test(name);
}

export class AppDirectory {
  private appsDir: string;

  constructor(appsDir: string) {
    this.appsDir = resolve(appsDir);
  }

  getAppsDir(): string {
    return this.appsDir;
  }

  getAppDir(appName: string): string {
    if (!isValidAppName(appName)) {
      throw new Error(`Invalid app name: ${JSON.stringify(appName)}`);
    }
    return join(this.appsDir, appName);
  }

  async rootExists(): Promise<boolean> {
    try {
      return (await stat(this.appsDir)).isDirectory();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async exists(appName: string): Promise<boolean> {
    if (!isValidAppName(appName)) return false;
    try {
      const info = await stat(this.getAppDir(appName));
      return info.isDirectory();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async listApps(): Promise<string[]> {
    try {
      const entries = await readdir(this.appsDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory() && isValidAppName(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}
