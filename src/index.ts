#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { collectDomains, createFetchContext } from "./domainsList";
import { writeIfChanged } from "./output";
import { readSourcesFile } from "./sources";
import type { Config, UpdateResult } from "./types";
import { errorMessage } from "./utils";

const DEFAULT_OUTPUT = "spamdomains.txt";
const DEFAULT_SOURCES_FILE = "sources.txt";
const DEFAULT_TIMEOUT_SECONDS = 30;
const NO_SOURCES_MESSAGE = "No sources provided. Add URLs to sources.txt or pass --source.";

// Ошибка конфигурации: процесс завершается с кодом 2 без сетевых запросов.
export class ConfigError extends Error {
	readonly exitCode = 2;

	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

// Источники из файла, затем переданные явно, в исходном порядке.
export function resolveSources(sourcesFile: string | undefined, extra: string[] = []): string[] {
	const fromFile = sourcesFile ? readSourcesFile(sourcesFile) : [];
	return [...fromFile, ...extra];
}

// Основной сценарий: загрузка источников, дедупликация, сортировка и запись при изменениях.
export async function runUpdate(cfg: Config): Promise<UpdateResult> {
	const output = cfg.output ?? DEFAULT_OUTPUT;
	const sourcesFile = cfg.sourcesFile ?? DEFAULT_SOURCES_FILE;
	const timeoutMs = cfg.timeoutMs ?? DEFAULT_TIMEOUT_SECONDS * 1000;
	const sources = resolveSources(sourcesFile, cfg.sources);

	if (!sources.length) throw new ConfigError(NO_SOURCES_MESSAGE);

	console.log(
		`[config] output=${output}, sourcesFile=${sourcesFile}, sources=${sources.length}, timeoutMs=${timeoutMs}`,
	);

	const ctx = createFetchContext(timeoutMs, cfg.fetchFn);
	const res = await collectDomains(sources, ctx);
	const ordered = [...res.domains].sort();
	const status = writeIfChanged(output, ordered);

	console.log(
		status === "updated"
			? `Updated ${output}: ${ordered.length} domains`
			: `No changes: ${output}: ${ordered.length} domains`,
	);

	return { status, output, count: ordered.length, sources: res.sources };
}

export type CliArgs = {
	output?: string;
	sourcesFile?: string;
	source?: string | string[];
	timeout?: string;
};

// --source может повторяться: citty отдаёт строку или массив.
function toList(raw: string | string[] | undefined): string[] {
	if (!raw) return [];
	const items = Array.isArray(raw) ? raw : [raw];
	return items.map((item) => item.trim()).filter(Boolean);
}

function parseTimeout(raw: string): number {
	const value = raw.trim();
	const seconds = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
	if (Number.isNaN(seconds) || seconds < 1) {
		throw new ConfigError(`Invalid --timeout: ${raw}. Must be a positive number of seconds.`);
	}
	return seconds * 1000;
}

// Запуск из командной строки; возвращает код выхода.
export async function runCli(args: CliArgs, overrides: Pick<Config, "fetchFn"> = {}): Promise<number> {
	try {
		await runUpdate({
			output: args.output,
			sourcesFile: args.sourcesFile,
			sources: toList(args.source),
			timeoutMs: parseTimeout(args.timeout ?? String(DEFAULT_TIMEOUT_SECONDS)),
			...overrides,
		});
		return 0;
	} catch (err) {
		if (err instanceof ConfigError) {
			console.error(err.message);
			return err.exitCode;
		}
		console.error("ERROR:", errorMessage(err));
		return 1;
	}
}

// Команда citty; overrides пробрасываются в runCli (подмена загрузки в тестах).
export function createCommand(overrides: Pick<Config, "fetchFn"> = {}) {
	return defineCommand({
		meta: {
			name: "spamdomains-sync",
			version: "1.0.0",
			description: "Merge remote domain blocklists into one sorted file",
		},
		args: {
			output: {
				type: "string",
				description: `Output file (default: ${DEFAULT_OUTPUT})`,
				default: DEFAULT_OUTPUT,
			},
			"sources-file": {
				type: "string",
				description: `File with one source URL per line (default: ${DEFAULT_SOURCES_FILE})`,
				default: DEFAULT_SOURCES_FILE,
			},
			source: {
				type: "string",
				description: "Source URL, can be specified multiple times",
			},
			timeout: {
				type: "string",
				description: `Fetch timeout per source in seconds (default: ${DEFAULT_TIMEOUT_SECONDS})`,
				default: String(DEFAULT_TIMEOUT_SECONDS),
			},
		},
		async run({ args }) {
			process.exitCode = await runCli(
				{
					output: args.output,
					sourcesFile: args["sources-file"],
					source: args.source,
					timeout: args.timeout,
				},
				overrides,
			);
		},
	});
}

export const command = createCommand();

if (require.main === module) {
	runMain(command).catch((err) => {
		console.error("ERROR:", err instanceof Error ? err.stack : String(err));
		process.exit(1);
	});
}
