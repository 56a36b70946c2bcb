import { createEmptySourceSet, type FileCategory, type SourceFile, type SourceSet } from 'tabletrace-core';

export function sourceFile(path: string, lines: readonly string[]): SourceFile {
  return { path, lines };
}

export function sourceSet(files: Partial<Record<FileCategory, SourceFile[]>>): SourceSet {
  return { ...createEmptySourceSet(), ...files };
}
