import crypto from "node:crypto";
import fs from "node:fs";
import type { UpdateStatus } from "./types";

// Один домен на строку; перевод строки в конце только у непустого списка.
export function renderDomains(domains: readonly string[]): string {
	return domains.length ? `${domains.join("\n")}\n` : "";
}

export function sha256Text(text: string): string {
	return crypto.createHash("sha256").update(text, "utf8").digest("hex");
}

// Текущее содержимое выходного файла или "", если его нет.
export function readExistingOutput(filePath: string): string {
	if (!fs.existsSync(filePath)) return "";
	return fs.readFileSync(filePath, "utf8");
}

// Пишем во временный файл рядом и подменяем им целевой.
export function writeFileAtomic(filePath: string, content: string): void {
	const tmp = `${filePath}.tmp`;
	fs.writeFileSync(tmp, content, "utf8");
	fs.renameSync(tmp, filePath);
}

// Записываем отсортированный список, только если содержимое изменилось.
export function writeIfChanged(filePath: string, domains: readonly string[]): UpdateStatus {
	const before = readExistingOutput(filePath);
	const after = renderDomains(domains);

	if (sha256Text(before) === sha256Text(after)) return "unchanged";

	writeFileAtomic(filePath, after);
	return "updated";
}
