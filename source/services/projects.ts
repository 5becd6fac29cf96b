/**
 * ProjectRegistry - Known projects and their roots.
 *
 * Path: {home}/projects.json (override via $SYMDEX_HOME)
 *
 * A project's id is derived from its canonical root, so registering the same
 * directory twice (or through a symlink) yields the same project.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import pLimit from 'p-limit';
import {z} from 'zod';
import {getProjectId, getProjectsPath} from '../lib/constants.js';
import {ConfigurationError, errorMessage, ProjectNotFoundError} from '../lib/errors.js';

const projectSchema = z.object({
	id: z.string().min(1),
	name: z.string().min(1),
	rootPath: z.string().min(1),
	createdAt: z.string(),
});

const registryFileSchema = z.object({
	version: z.literal(1),
	projects: z.array(projectSchema),
});

export type Project = z.infer<typeof projectSchema>;

type RegistryFile = z.infer<typeof registryFileSchema>;

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class ProjectRegistry {
	private readonly filePath: string;
	/** Serializes read-modify-write cycles */
	private readonly lock = pLimit(1);

	constructor(filePath: string = getProjectsPath()) {
		this.filePath = filePath;
	}

	/**
	 * Register a project root. Idempotent: an existing project is returned,
	 * renamed when `name` is given.
	 *
	 * @throws Error when the root is not a directory
	 */
	async register(rootPath: string, name?: string): Promise<Project> {
		const canonical = await fs.realpath(rootPath);
		const stat = await fs.stat(canonical);
		if (!stat.isDirectory()) {
			throw new Error(`Project root is not a directory: ${rootPath}`);
		}
		const id = getProjectId(canonical);

		return this.lock(async () => {
			const file = await this.read();
			const existing = file.projects.find(p => p.id === id);
			if (existing) {
				if (name && name !== existing.name) {
					existing.name = name;
					await this.write(file);
				}
				return existing;
			}

			const project: Project = {
				id,
				name: name ?? path.basename(canonical),
				rootPath: canonical,
				createdAt: new Date().toISOString(),
			};
			file.projects.push(project);
			await this.write(file);
			return project;
		});
	}

	async get(projectId: string): Promise<Project | null> {
		const file = await this.read();
		return file.projects.find(p => p.id === projectId) ?? null;
	}

	/**
	 * @throws ProjectNotFoundError for an unknown id
	 */
	async require(projectId: string): Promise<Project> {
		const project = await this.get(projectId);
		if (!project) {
			throw new ProjectNotFoundError(projectId);
		}
		return project;
	}

	async list(): Promise<Project[]> {
		const file = await this.read();
		return [...file.projects].sort((a, b) => a.name.localeCompare(b.name));
	}

	/**
	 * @returns whether the project was registered
	 */
	async remove(projectId: string): Promise<boolean> {
		return this.lock(async () => {
			const file = await this.read();
			const remaining = file.projects.filter(p => p.id !== projectId);
			if (remaining.length === file.projects.length) {
				return false;
			}
			await this.write({...file, projects: remaining});
			return true;
		});
	}

	private async read(): Promise<RegistryFile> {
		let content: string;
		try {
			content = await fs.readFile(this.filePath, 'utf-8');
		} catch (error) {
			if (isMissingFile(error)) {
				return {version: 1, projects: []};
			}
			throw error;
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(content);
		} catch (error) {
			throw new ConfigurationError(
				`Invalid projects file at ${this.filePath}: ${errorMessage(error)}`,
			);
		}
		const result = registryFileSchema.safeParse(parsed);
		if (!result.success) {
			throw new ConfigurationError(
				`Invalid projects file at ${this.filePath}: ${result.error.message}`,
			);
		}
		return result.data;
	}

	private async write(file: RegistryFile): Promise<void> {
		await fs.mkdir(path.dirname(this.filePath), {recursive: true});
		const tempPath = `${this.filePath}.tmp`;
		await fs.writeFile(tempPath, JSON.stringify(file, null, '\t') + '\n');
		await fs.rename(tempPath, this.filePath);
	}
}
