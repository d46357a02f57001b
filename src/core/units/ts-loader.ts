/**
 * TypeScript front-end: loads directories of sources through ts-morph and
 * exposes them as program units.
 *
 * A unit is one directory of `.ts`/`.tsx` files. Its identity is the
 * directory relative to the project root, in POSIX form (`.` for the root).
 * Relative imports between directories become unit dependencies; imported
 * directories are loaded as units too, so the graph is complete.
 */
import * as path from 'node:path';
import {
  Project,
  ts,
  type CompilerOptions,
  type Diagnostic as TsDiagnostic,
  type SourceFile,
} from 'ts-morph';
import { LoadError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { LoadOptions, ProgramUnit, TypeCheckError, UnitLoader } from './types.js';

export interface TsUnit extends ProgramUnit {
  readonly imports: readonly TsUnit[];
  readonly sourceFiles: readonly SourceFile[];
}

export interface TsMorphUnitLoaderOptions {
  /** Directory unit ids are relative to. Defaults to the file system's cwd. */
  projectRoot?: string;
  /** Pre-built project, e.g. one backed by an in-memory file system */
  project?: Project;
  compilerOptions?: CompilerOptions;
}

const SOURCE_EXTENSIONS = ['.ts', '.tsx'];
const RECURSIVE_SUFFIX = '/...';
const EXCLUDED_SEGMENTS = ['node_modules', 'dist'];
const TEST_FILE_PATTERN = /\.(test|spec)\.tsx?$/;
const BUILD_TAG_PATTERN = /@build\s+([^\n*]+)/;

const DEFAULT_COMPILER_OPTIONS: CompilerOptions = {
  strict: true,
  skipLibCheck: true,
  noEmit: true,
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
};

interface MutableUnit extends TsUnit {
  imports: TsUnit[];
  errors: TypeCheckError[];
  illTyped: boolean;
}

/**
 * Whether a file belongs to the build for the given tags. A file without
 * an `@build` header is always included.
 */
export function matchesBuildTags(header: string, tags: readonly string[]): boolean {
  const match = BUILD_TAG_PATTERN.exec(header);
  if (!match) {
    return true;
  }
  const required = match[1].trim().split(/[\s,]+/).filter(Boolean);
  return required.some((tag) => tags.includes(tag));
}

export function isTestFile(filePath: string): boolean {
  return TEST_FILE_PATTERN.test(filePath) || filePath.split('/').includes('__tests__');
}

interface RequestedDirectory {
  dir: string;
  /** Named on the command line, as opposed to found below a `dir/...` */
  explicit: boolean;
  raw: string;
}

function headerOf(sourceFile: SourceFile): string {
  const text = sourceFile.getFullText();
  const first = sourceFile.getStatements()[0];
  return first ? text.slice(0, first.getStart()) : text;
}

function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Loads program units from TypeScript sources.
 */
export class TsMorphUnitLoader implements UnitLoader<TsUnit> {
  private readonly project: Project;
  private readonly projectRoot: string;

  constructor(options: TsMorphUnitLoaderOptions = {}) {
    this.project =
      options.project ??
      new Project({
        compilerOptions: options.compilerOptions ?? DEFAULT_COMPILER_OPTIONS,
        skipAddingFilesFromTsConfig: true,
      });
    this.projectRoot = toPosix(
      path.resolve(options.projectRoot ?? this.project.getFileSystem().getCurrentDirectory()),
    );
  }

  async load(paths: readonly string[], options: LoadOptions): Promise<TsUnit[]> {
    const requested = paths.length > 0 ? paths : ['.'];
    const units = new Map<string, MutableUnit>();
    const roots: MutableUnit[] = [];

    if (requested[0].endsWith('.ts') || requested[0].endsWith('.tsx')) {
      // Explicit files form a single unit.
      const files = requested.map((p) => this.resolve(p));
      for (const file of files) {
        if (!this.project.getFileSystem().fileExistsSync(file)) {
          throw new LoadError(ErrorCodes.PATH_NOT_FOUND, `can't load file "${file}"`, { path: file });
        }
      }
      const unit = this.createUnit(path.posix.dirname(files[0]), files, options);
      units.set(unit.id, unit);
      roots.push(unit);
    } else {
      for (const { dir, explicit, raw } of this.expandDirectories(requested)) {
        const unit = this.loadDirectory(dir, options);
        if (!unit && explicit) {
          throw new LoadError(ErrorCodes.PATH_NOT_FOUND, `can't load package "${raw}": no source files in ${dir}`, {
            path: raw,
          });
        }
        if (unit && !units.has(unit.id)) {
          units.set(unit.id, unit);
          roots.push(unit);
        }
      }
    }

    this.project.resolveSourceFileDependencies();
    this.linkImports(units, options);

    for (const unit of units.values()) {
      unit.errors = unit.sourceFiles.flatMap((sf) => this.typeErrors(sf));
      unit.illTyped = unit.errors.length > 0;
    }

    logger.debug(`loaded ${roots.length} unit(s), ${units.size} including dependencies`);
    return roots;
  }

  /**
   * Whether `filePath` is a source file to analyse. Excluded directories
   * count only below the project root, so a root that itself sits under a
   * `dist` or `node_modules` directory still loads.
   */
  private isSourceFile(filePath: string): boolean {
    const relative = path.posix.relative(this.projectRoot, filePath);
    return (
      SOURCE_EXTENSIONS.some((ext) => filePath.endsWith(ext)) &&
      !filePath.endsWith('.d.ts') &&
      !relative.split('/').some((segment) => EXCLUDED_SEGMENTS.includes(segment))
    );
  }

  private resolve(p: string): string {
    return toPosix(path.posix.resolve(this.projectRoot, toPosix(p)));
  }

  /**
   * Resolve requested paths to directories. `dir/...` stands for `dir` and
   * every directory below it that holds sources.
   */
  private expandDirectories(requested: readonly string[]): RequestedDirectory[] {
    const fs = this.project.getFileSystem();
    const dirs: RequestedDirectory[] = [];

    for (const raw of requested) {
      const recursive = raw === '...' || raw.endsWith(RECURSIVE_SUFFIX);
      const base = recursive ? raw.slice(0, -3) || '.' : raw;
      const dir = this.resolve(base);
      if (!fs.directoryExistsSync(dir)) {
        throw new LoadError(ErrorCodes.PATH_NOT_FOUND, `can't load package "${raw}": no such directory ${dir}`, {
          path: raw,
        });
      }

      if (!recursive) {
        dirs.push({ dir, explicit: true, raw });
        continue;
      }

      const found = fs
        .globSync(SOURCE_EXTENSIONS.map((ext) => `${dir}/**/*${ext}`))
        .map(toPosix)
        .filter((file) => this.isSourceFile(file))
        .map((file) => path.posix.dirname(file));
      const expanded = [dir, ...found].filter((d, i, all) => all.indexOf(d) === i).sort();
      dirs.push(...expanded.map((d) => ({ dir: d, explicit: false, raw })));
    }
    return dirs;
  }

  private loadDirectory(dir: string, options: LoadOptions): MutableUnit | undefined {
    const files = this.project
      .getFileSystem()
      .globSync(SOURCE_EXTENSIONS.map((ext) => `${dir}/*${ext}`))
      .map(toPosix)
      .filter((file) => path.posix.dirname(file) === dir && this.isSourceFile(file))
      .sort();
    const unit = this.createUnit(dir, files, options);
    return unit.sourceFiles.length > 0 ? unit : undefined;
  }

  private createUnit(dir: string, files: readonly string[], options: LoadOptions): MutableUnit {
    const sourceFiles: SourceFile[] = [];
    for (const file of files) {
      if (!options.includeTests && isTestFile(file)) continue;

      const sourceFile = this.project.addSourceFileAtPath(file);
      if (!matchesBuildTags(headerOf(sourceFile), options.tags)) {
        this.project.removeSourceFile(sourceFile);
        continue;
      }
      sourceFiles.push(sourceFile);
    }

    const relative = path.posix.relative(this.projectRoot, dir);
    return {
      id: relative === '' ? '.' : relative,
      files: sourceFiles.map((sf) => sf.getFilePath()),
      sourceFiles,
      illTyped: false,
      errors: [],
      imports: [],
    };
  }

  /**
   * Fill in `imports` for every unit, loading imported directories as new
   * units until the graph is closed.
   */
  private linkImports(units: Map<string, MutableUnit>, options: LoadOptions): void {
    const pending = [...units.values()];

    while (pending.length > 0) {
      const unit = pending.shift();
      if (!unit) break;

      const seen = new Set<string>([unit.id]);
      for (const sourceFile of unit.sourceFiles) {
        for (const target of this.relativeImports(sourceFile)) {
          const dir = path.posix.dirname(target.getFilePath());
          const relative = path.posix.relative(this.projectRoot, dir);
          const id = relative === '' ? '.' : relative;
          if (seen.has(id)) continue;
          seen.add(id);

          let dep = units.get(id);
          if (!dep) {
            dep = this.loadDirectory(dir, options);
            if (!dep) continue;
            units.set(dep.id, dep);
            pending.push(dep);
          }
          unit.imports.push(dep);
        }
      }
    }
  }

  private relativeImports(sourceFile: SourceFile): SourceFile[] {
    const targets: SourceFile[] = [];
    const declarations = [...sourceFile.getImportDeclarations(), ...sourceFile.getExportDeclarations()];
    for (const declaration of declarations) {
      const specifier = declaration.getModuleSpecifierValue();
      if (!specifier || !specifier.startsWith('.')) continue;

      const target = declaration.getModuleSpecifierSourceFile();
      if (target && this.isSourceFile(target.getFilePath())) {
        targets.push(target);
      }
    }
    return targets;
  }

  private typeErrors(sourceFile: SourceFile): TypeCheckError[] {
    return sourceFile.getPreEmitDiagnostics().map((diagnostic) => toTypeCheckError(sourceFile, diagnostic));
  }
}

function toTypeCheckError(sourceFile: SourceFile, diagnostic: TsDiagnostic): TypeCheckError {
  const text = diagnostic.getMessageText();
  const message = typeof text === 'string' ? text : ts.flattenDiagnosticMessageText(text.compilerObject, '\n');
  const start = diagnostic.getStart();
  const file = diagnostic.getSourceFile() ?? sourceFile;
  const { line, column } = start === undefined ? { line: 0, column: 0 } : file.getLineAndColumnAtPos(start);

  return {
    position: { filename: file.getFilePath(), line, column },
    message,
  };
}
