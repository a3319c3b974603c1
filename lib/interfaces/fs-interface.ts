import * as fs from 'fs';
import { Writable } from 'stream';

/**
 * File system abstraction interface for testability
 */
export interface IFileSystem {
    existsSync(path: string): boolean;
    isFile(path: string): boolean;
    mkdirSync(path: string, options?: { recursive?: boolean }): void;
    readdirSync(path: string): string[];
    readFileSync(path: string): string;
    writeFileSync(path: string, data: string): void;
    appendFileSync(path: string, data: string): void;
    unlinkSync(path: string): void;
    getModifiedTime(path: string): number;
    createWriteStream(path: string): Writable;
}

/**
 * Default implementation using Node.js fs module
 */
export class NodeFileSystem implements IFileSystem {
    existsSync(path: string): boolean {
        return fs.existsSync(path);
    }

    isFile(path: string): boolean {
        try {
            return fs.statSync(path).isFile();
        } catch {
            return false;
        }
    }

    mkdirSync(path: string, options?: { recursive?: boolean }): void {
        fs.mkdirSync(path, options);
    }

    readdirSync(path: string): string[] {
        return fs.readdirSync(path);
    }

    readFileSync(path: string): string {
        return fs.readFileSync(path, 'utf8');
    }

    writeFileSync(path: string, data: string): void {
        fs.writeFileSync(path, data, 'utf8');
    }

    appendFileSync(path: string, data: string): void {
        fs.appendFileSync(path, data, 'utf8');
    }

    unlinkSync(path: string): void {
        fs.unlinkSync(path);
    }

    getModifiedTime(path: string): number {
        return fs.statSync(path).mtimeMs;
    }

    createWriteStream(path: string): Writable {
        return fs.createWriteStream(path);
    }
}
