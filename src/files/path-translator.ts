/**
 * Path Translator - converts between native drive-letter paths and the
 * mount-point paths seen inside the compatibility subsystem
 *
 *   D:\OpenROAD\bin\openroad  <->  /mnt/d/OpenROAD/bin/openroad
 *
 * Purely syntactic: no filesystem access.
 */

import { UnsupportedPathError } from "../errors.js";

export interface PathTranslatorConfig {
  /** Where drives are mounted inside the subsystem */
  mountPrefix: string;
}

const defaultConfig: PathTranslatorConfig = {
  mountPrefix: "/mnt",
};

const NATIVE_PATH = /^([A-Za-z]):(.*)$/s;

/**
 * True when the argument looks like an absolute native path (X:\ or X:/)
 */
export function isNativePath(value: string): boolean {
  return /^[A-Za-z]:[\\/]/.test(value);
}

class PathTranslator {
  private config: PathTranslatorConfig;

  constructor(config: Partial<PathTranslatorConfig> = {}) {
    this.config = { ...defaultConfig, ...config };
  }

  getMountPrefix(): string {
    return this.config.mountPrefix;
  }

  /**
   * Native path -> subsystem path
   */
  toForeign(nativePath: string): string {
    const match = NATIVE_PATH.exec(nativePath);
    if (!match) {
      throw new UnsupportedPathError(nativePath, "expected a drive designator such as C: or D:");
    }

    const [, drive, rest] = match;
    if (rest !== "" && !rest.startsWith("\\") && !rest.startsWith("/")) {
      throw new UnsupportedPathError(nativePath, "drive-relative paths are not absolute");
    }

    return `${this.config.mountPrefix}/${drive.toLowerCase()}${rest.replace(/\\/g, "/")}`;
  }

  /**
   * Subsystem path -> native path
   */
  toNative(foreignPath: string): string {
    const prefix = `${this.config.mountPrefix}/`;
    if (!foreignPath.startsWith(prefix)) {
      throw new UnsupportedPathError(foreignPath, `not under the mount prefix ${this.config.mountPrefix}`);
    }

    const afterPrefix = foreignPath.slice(prefix.length);
    const match = /^([a-z])(\/.*)?$/s.exec(afterPrefix);
    if (!match) {
      throw new UnsupportedPathError(foreignPath, "expected a single lower-case drive letter after the mount prefix");
    }

    const [, drive, rest = ""] = match;
    return `${drive.toUpperCase()}:${rest.replace(/\//g, "\\")}`;
  }

  /**
   * Translate an argument only when it is a native path
   */
  translateArgument(arg: string): string {
    return isNativePath(arg) ? this.toForeign(arg) : arg;
  }
}

// Default instance
export const pathTranslator = new PathTranslator();

export function toForeign(nativePath: string): string {
  return pathTranslator.toForeign(nativePath);
}

export function toNative(foreignPath: string): string {
  return pathTranslator.toNative(foreignPath);
}

// Export class for custom mount prefixes
export { PathTranslator };
