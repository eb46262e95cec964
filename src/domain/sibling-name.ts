import type { ValueOf } from '../types/value-of';

export const NAME_KIND = {
  FILE: 'file',
  DIRECTORY: 'directory',
} as const;

export type NameKind = ValueOf<typeof NAME_KIND>;

export type NameParts = {
  stem: string;
  extension: string;
};

/**
 * Split a file name into stem and last extension. Leading-dot names
 * (".bashrc") and names ending in a dot have no extension. Directories
 * never have one: "v1.2" stays whole.
 */
export const splitName = (name: string, kind: NameKind): NameParts => {
  if (kind === NAME_KIND.DIRECTORY) {
    return { stem: name, extension: '' };
  }

  const dotIndex = name.lastIndexOf('.');
  if (dotIndex <= 0 || dotIndex === name.length - 1) {
    return { stem: name, extension: '' };
  }

  return {
    stem: name.slice(0, dotIndex),
    extension: name.slice(dotIndex),
  };
};

/**
 * siblingName('report.pdf', 2, 'file') === 'report_2.pdf'
 */
export const siblingName = (name: string, counter: number, kind: NameKind): string => {
  const { stem, extension } = splitName(name, kind);
  return `${stem}_${counter}${extension}`;
};
