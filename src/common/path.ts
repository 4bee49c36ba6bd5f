import path from 'path';

const separatorCharacters = /[\\/\0]/;
const unpairedSurrogate = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export const hasSeparator = (name: string) => separatorCharacters.test(name);

/**
 * Returns why `name` cannot be used as a bare filename, or null when it can.
 * A proposed name must stay inside the directory of the file it renames.
 */
export const invalidBaseNameReason = (name: string): string | null => {
  if (name.length === 0) {
    return 'Name cannot be empty';
  }
  if (name === '.' || name === '..') {
    return `Name ${name} refers to a directory`;
  }
  if (hasSeparator(name)) {
    return `Name ${name} contains a path separator`;
  }
  if (unpairedSurrogate.test(name)) {
    return 'Name contains an unpaired surrogate';
  }
  return null;
};

/** Splits at the last dot; the extension keeps its leading dot. */
export const splitStemAndExtension = (name: string) => {
  const lastDot = name.lastIndexOf('.');
  if (lastDot < 0) {
    return { stem: name, extension: '' };
  }
  return { stem: name.slice(0, lastDot), extension: name.slice(lastDot) };
};

export const comparisonKey = (value: string, caseInsensitive: boolean) =>
  caseInsensitive ? value.toLowerCase() : value;

export const siblingPath = (originalPath: string, newName: string) =>
  path.join(path.dirname(originalPath), newName);
