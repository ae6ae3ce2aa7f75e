/**
 * Filesystem capability.
 *
 * Components that touch the disk take a {@link FileSystem} instead of calling
 * `node:fs` directly, so that they can run against {@link MemoryFileSystem}
 * in tests. Implementations throw on genuine I/O failure; callers convert
 * those into typed errors.
 */

import fs from "node:fs";
import path from "node:path";

export interface FileSystem {
	exists(filePath: string): boolean;
	readFile(filePath: string): Uint8Array;
	writeFile(filePath: string, data: Uint8Array): void;
	/** Create a directory and any missing ancestors. Existing directories are fine. */
	createDirectory(dirPath: string): void;
}

/** {@link FileSystem} backed by the real disk. */
export class NodeFileSystem implements FileSystem {
	exists(filePath: string): boolean {
		return fs.existsSync(filePath);
	}

	readFile(filePath: string): Uint8Array {
		return fs.readFileSync(filePath);
	}

	writeFile(filePath: string, data: Uint8Array): void {
		fs.writeFileSync(filePath, data);
	}

	createDirectory(dirPath: string): void {
		fs.mkdirSync(dirPath, { recursive: true });
	}
}

export type FileOperation = "read" | "write" | "createDirectory";

/**
 * In-memory {@link FileSystem} with POSIX paths.
 *
 * Writing requires the parent directory to exist, like the real disk.
 * `failOn` makes an operation throw for any path, to exercise error paths.
 */
export class MemoryFileSystem implements FileSystem {
	private readonly files = new Map<string, Uint8Array>();
	private readonly dirs = new Set<string>(["/"]);
	private readonly failures = new Map<FileOperation, string>();

	constructor(initial: Record<string, string | Uint8Array> = {}) {
		for (const [filePath, content] of Object.entries(initial)) {
			this.createDirectory(path.posix.dirname(filePath));
			this.files.set(filePath, typeof content === "string" ? new TextEncoder().encode(content) : content);
		}
	}

	failOn(operation: FileOperation, message: string): this {
		this.failures.set(operation, message);
		return this;
	}

	exists(filePath: string): boolean {
		return this.files.has(filePath) || this.dirs.has(filePath);
	}

	readFile(filePath: string): Uint8Array {
		this.maybeFail("read");
		const data = this.files.get(filePath);
		if (data === undefined) {
			throw new Error(`ENOENT: no such file, open '${filePath}'`);
		}
		return data;
	}

	writeFile(filePath: string, data: Uint8Array): void {
		this.maybeFail("write");
		const parent = path.posix.dirname(filePath);
		if (!this.dirs.has(parent)) {
			throw new Error(`ENOENT: no such directory, open '${filePath}'`);
		}
		this.files.set(filePath, data);
	}

	createDirectory(dirPath: string): void {
		this.maybeFail("createDirectory");
		let current = path.posix.normalize(dirPath);
		while (!this.dirs.has(current)) {
			this.dirs.add(current);
			current = path.posix.dirname(current);
		}
	}

	/** Decoded text of a stored file, or `undefined` when absent. */
	readText(filePath: string): string | undefined {
		const data = this.files.get(filePath);
		return data === undefined ? undefined : new TextDecoder().decode(data);
	}

	hasDirectory(dirPath: string): boolean {
		return this.dirs.has(dirPath);
	}

	private maybeFail(operation: FileOperation): void {
		const message = this.failures.get(operation);
		if (message !== undefined) {
			throw new Error(message);
		}
	}
}
