import path from 'path';
import fs from 'fs/promises';
import { AppError } from './app-error';
import { ErrorCodes } from './error-codes';

/**
 * Path without its final extension: "dir/report.json" -> "dir/report"
 */
export function stripExtension(filePath: string): string {
  const ext = path.extname(filePath);
  return ext ? filePath.slice(0, -ext.length) : filePath;
}

export function replaceExtension(filePath: string, extension: string): string {
  return `${stripExtension(filePath)}${extension}`;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function assertFileExists(filePath: string): Promise<void> {
  if (!(await fileExists(filePath))) {
    throw AppError.notFound(`File ${filePath} not found`);
  }
}

export async function readTextFile(filePath: string): Promise<string> {
  await assertFileExists(filePath);
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AppError(`Could not read ${filePath}: ${reason}`, ErrorCodes.FILE_READ_ERROR);
  }
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.writeFile(filePath, content, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AppError(`Could not write ${filePath}: ${reason}`, ErrorCodes.FILE_WRITE_ERROR);
  }
}
