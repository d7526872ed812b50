// Функция загрузки текста источника (подменяется в тестах).
export type FetchFn = (url: string, timeoutMs: number) => Promise<string>;

// Конфигурация одного прогона обновления.
export type Config = {
	output?: string;
	sourcesFile?: string;
	sources?: string[];
	timeoutMs?: number;
	fetchFn?: FetchFn;
};

// Режим разбора строки: hosts-файл или обычный список.
export type LineMode = "hosts" | "generic";

// Статистика по одному источнику.
export type SourceStats = {
	url: string;
	lines: number;
	hosts: number;
	domains: number;
};

// Итог сбора доменов со всех источников.
export type DomainLoadResult = {
	domains: Set<string>;
	sources: SourceStats[];
};

export type UpdateStatus = "updated" | "unchanged";

// Результат прогона: записан ли файл и сколько доменов в нём.
export type UpdateResult = {
	status: UpdateStatus;
	output: string;
	count: number;
	sources: SourceStats[];
};
