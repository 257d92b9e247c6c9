import * as fs from 'fs';
import * as path from 'path';

export class InputFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputFileError';
  }
}

/**
 * Make sure the input exists and is a .gpx file
 */
export function checkInputFile(filename: string): void {
  if (!fs.existsSync(filename) || !fs.statSync(filename).isFile()) {
    throw new InputFileError(`input file ${filename} not found`);
  }
  if (path.extname(filename) !== '.gpx') {
    throw new InputFileError('please choose a gpx file as input');
  }
}

/**
 * Derive the output path: the input's name with the suffix before its
 * extension, in `destination` when given, beside the input otherwise
 */
export function makeOutputPath(filename: string, destination: string | null, suffix: string): string {
  const { dir, name, ext } = path.parse(filename);
  return path.join(destination ?? dir, `${name}${suffix}${ext}`);
}
