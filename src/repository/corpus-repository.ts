/**
 * Corpus Repository for the pipeline lineage tracer
 * Lists the source files under a corpus root and serves their decoded text
 */

import { Dirent, readFileSync, readdirSync, statSync } from 'node:fs';
import { join, relative, resolve, sep } from 'node:path';
import { ScriptPath } from '../types/common.js';
import { CorpusError, ErrorCategory, ERROR_HANDLERS } from '../types/error-handling.js';
import { Logger, defaultLogger } from '../utils/logger.js';

/**
 * Interface for the Corpus Repository
 */
export interface ICorpusRepository {
  /** Absolute corpus root, or a label for in-memory corpora */
  readonly root: string;

  /** Paths relative to the root, `/`-separated, sorted */
  listSourceFiles(): ScriptPath[];

  /** Decoded text, or undefined when the file cannot be read */
  readText(path: ScriptPath): string | undefined;

  /** Files whose last read failed and directories that could not be listed, sorted */
  unreadableFiles(): ScriptPath[];
}

// ==================== Decoding ====================

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * UTF-8 when the bytes are valid, latin-1 otherwise; a leading BOM is dropped
 */
export function decodeSourceText(bytes: Buffer): string {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    text = bytes.toString('latin1');
  }
  return text.startsWith('\uFEFF') ? text.slice(1) : text;
}

function toScriptPath(root: string, absolutePath: string): ScriptPath {
  return relative(root, absolutePath).split(sep).join('/');
}

// ==================== File system ====================

/**
 * Repository over a directory tree
 */
export class FileSystemCorpusRepository implements ICorpusRepository {
  readonly root: string;
  private readonly files: ScriptPath[];
  private readonly logger: Logger;
  private textCache: Map<ScriptPath, string> = new Map();
  private unreadable: Set<ScriptPath>;

  private constructor(root: string, files: ScriptPath[], logger: Logger, unreadable: ScriptPath[]) {
    this.root = root;
    this.files = files;
    this.logger = logger;
    this.unreadable = new Set(unreadable);
  }

  /**
   * Walk `root` and keep files with one of `extensions` (lower-cased, with dot),
   * following symlinked files. Subdirectories and links that cannot be read
   * are skipped with a warning. Throws CorpusError when the root is missing,
   * unreadable, not a directory, or has no such files.
   */
  static load(
    root: string,
    extensions: readonly string[],
    logger: Logger = defaultLogger.child('corpus')
  ): FileSystemCorpusRepository {
    const absoluteRoot = resolve(root);

    let isDirectory: boolean;
    try {
      isDirectory = statSync(absoluteRoot).isDirectory();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CorpusError(absoluteRoot, `Corpus root does not exist: ${absoluteRoot} (${reason})`);
    }
    if (!isDirectory) {
      throw new CorpusError(absoluteRoot, `Corpus root is not a directory: ${absoluteRoot}`);
    }

    const wanted = new Set(extensions.map((extension) => extension.toLowerCase()));
    const files: ScriptPath[] = [];
    const unreadable: ScriptPath[] = [];
    const skip = (fullPath: string, error: unknown): void => {
      const path = toScriptPath(absoluteRoot, fullPath);
      unreadable.push(path);
      logger.warn(ERROR_HANDLERS[ErrorCategory.UNREADABLE_SOURCE].userMessage, {
        path,
        reason: error instanceof Error ? error.message : String(error),
      });
    };
    const walk = (dir: string): void => {
      let entries: Dirent[];
      try {
        entries = readdirSync(dir, { withFileTypes: true });
      } catch (error) {
        if (dir === absoluteRoot) {
          const reason = error instanceof Error ? error.message : String(error);
          throw new CorpusError(absoluteRoot, `Corpus root cannot be read: ${absoluteRoot} (${reason})`);
        }
        skip(dir, error);
        return;
      }

      for (const entry of entries) {
        const fullPath = join(dir, entry.name);
        if (entry.isDirectory()) {
          walk(fullPath);
          continue;
        }
        if (!wanted.has(extensionOf(entry.name))) continue;

        let isFile = entry.isFile();
        if (entry.isSymbolicLink()) {
          // linked files are listed; linked directories are not descended
          try {
            isFile = statSync(fullPath).isFile();
          } catch (error) {
            skip(fullPath, error);
            continue;
          }
        }
        if (isFile) files.push(toScriptPath(absoluteRoot, fullPath));
      }
    };
    walk(absoluteRoot);

    if (files.length === 0) {
      throw new CorpusError(
        absoluteRoot,
        `No source files (${[...wanted].join(', ')}) found under ${absoluteRoot}`
      );
    }

    files.sort();
    logger.info('Corpus scanned', { root: absoluteRoot, files: files.length, unreadable: unreadable.length });
    return new FileSystemCorpusRepository(absoluteRoot, files, logger, unreadable);
  }

  listSourceFiles(): ScriptPath[] {
    return [...this.files];
  }

  readText(path: ScriptPath): string | undefined {
    const cached = this.textCache.get(path);
    if (cached !== undefined) return cached;

    try {
      const text = decodeSourceText(readFileSync(join(this.root, path)));
      this.textCache.set(path, text);
      this.unreadable.delete(path);
      return text;
    } catch (error) {
      this.unreadable.add(path);
      this.logger.warn(ERROR_HANDLERS[ErrorCategory.UNREADABLE_SOURCE].userMessage, {
        path,
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  unreadableFiles(): ScriptPath[] {
    return [...this.unreadable].sort();
  }
}

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

// ==================== In memory ====================

/**
 * In-memory implementation of the Corpus Repository
 */
export class InMemoryCorpusRepository implements ICorpusRepository {
  readonly root: string;
  private files: Map<ScriptPath, string> = new Map();
  private failing: Set<ScriptPath>;
  private unreadable: Set<ScriptPath>;

  constructor(files: Record<ScriptPath, string> = {}, options: { root?: string; unreadable?: ScriptPath[] } = {}) {
    this.root = options.root ?? 'memory://corpus';
    for (const [path, text] of Object.entries(files)) {
      this.files.set(path, text);
    }
    this.failing = new Set(options.unreadable ?? []);
  }

  setFile(path: ScriptPath, text: string): void {
    this.files.set(path, text);
  }

  listSourceFiles(): ScriptPath[] {
    return [...new Set([...this.files.keys(), ...this.failing])].sort();
  }

  readText(path: ScriptPath): string | undefined {
    if (this.failing.has(path)) {
      this.unreadable.add(path);
      return undefined;
    }
    return this.files.get(path);
  }

  unreadableFiles(): ScriptPath[] {
    return [...this.unreadable].sort();
  }
}
