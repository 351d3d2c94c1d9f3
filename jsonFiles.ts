import fs from 'fs';
import path from 'path';
import { DataFileError, errorMessage } from './errors';

export function writeJson(file: string, data: unknown): void {
    try {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, JSON.stringify(data, null, 2) + '\n', 'utf8');
    } catch (err) {
        throw new DataFileError(`Could not write ${file}: ${errorMessage(err)}`, file);
    }
}

/**
 * Reads a JSON file written by this project. The caller names the shape; a
 * missing file is undefined, an unreadable one is a DataFileError.
 */
export function readJson<T>(file: string): T | undefined {
    if (!fs.existsSync(file)) return undefined;
    try {
        return JSON.parse(fs.readFileSync(file, 'utf8')) as T;
    } catch (err) {
        throw new DataFileError(`Could not read ${file}: ${errorMessage(err)}`, file);
    }
}

export function writeText(file: string, text: string): void {
    try {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, text, 'utf8');
    } catch (err) {
        throw new DataFileError(`Could not write ${file}: ${errorMessage(err)}`, file);
    }
}
