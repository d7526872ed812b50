import { toASCII as idnaToASCII } from "tr46";
import type { DomainLoadResult, FetchFn, LineMode, SourceStats } from "./types";
import { httpGetText } from "./sources";
import { errorMessage, SPACE_RUN_RE, splitLines, trimSpace } from "./utils";

const DOMAIN_RE =
	/^(?:\*\.)?(?=.{1,253}$)(?!-)(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/;
const HOSTS_MARKERS = ["0.0.0.0", "127.0.0.1", "::1"];
const SCHEME_RE = /^https?:\/\//;
const NON_ASCII_RE = /[^\u0000-\u007f]/;
const INLINE_COMMENT_RE = new RegExp(`${SPACE_RUN_RE.source}#`);

// Контекст загрузки источников.
export type FetchContext = {
	timeoutMs: number;
	fetchFn: FetchFn;
};

// Часть строки до первого вхождения разделителя.
function before(value: string, separator: string): string {
	const index = value.indexOf(separator);
	return index >= 0 ? value.slice(0, index) : value;
}

// Четыре десятичные группы 0..255 через точку.
export function isIPv4(value: string): boolean {
	const parts = value.split(".");
	if (parts.length !== 4) return false;

	return parts.every((part) => /^\d+$/.test(part) && Number.parseInt(part, 10) <= 255);
}

// Синтаксическая проверка домена в нижнем регистре (допускается префикс "*.").
export function isValidDomain(value: string): boolean {
	if (!value || isIPv4(value)) return false;
	return DOMAIN_RE.test(value);
}

// IDNA (UTS #46, transitional: ß -> ss, ς -> σ, ZWJ/ZWNJ удаляются).
// ASCII-строки не меняются; null при ошибке кодирования.
function toASCII(host: string): string | null {
	if (!NON_ASCII_RE.test(host)) return host;
	return idnaToASCII(host, { transitionalProcessing: true });
}

/**
 * Приводим токен из любого формата списка (URL, hosts, adblock-правило) к
 * каноническому домену. Возвращает null, если токен доменом не является.
 *
 * Маркер "*." снимается безусловно: "*.cdn.example.org" -> "cdn.example.org".
 */
export function normalizeDomain(raw: string): string | null {
	let s = trimSpace(raw).toLowerCase();
	if (!s) return null;

	s = s.replace(/^["' ]+|["' ]+$/g, "");

	if (SCHEME_RE.test(s)) s = before(s.replace(SCHEME_RE, ""), "/");

	s = before(s, ":");

	if (s.startsWith("||")) s = s.slice(2);
	if (s.startsWith(".")) s = s.slice(1);
	if (s.startsWith("*.")) s = s.slice(2);
	if (s.endsWith("^")) s = s.slice(0, -1);

	s = s.replace(/^\.+|\.+$/g, "");
	if (!s || isIPv4(s)) return null;

	const ascii = toASCII(s);
	if (!ascii || !isValidDomain(ascii)) return null;

	return ascii;
}

// Убираем комментарии: целые строки (# и //) и хвост после " #".
export function stripComment(line: string): string {
	const s = trimSpace(line);
	if (!s || s.startsWith("#") || s.startsWith("//")) return "";

	return trimSpace(s.split(INLINE_COMMENT_RE, 1)[0] ?? "");
}

// hosts-строка узнаётся по null/loopback-адресу.
export function detectLineMode(line: string): LineMode {
	return HOSTS_MARKERS.some((marker) => line.includes(marker)) ? "hosts" : "generic";
}

/**
 * Домены из одной строки списка. Каждый токен пробуем нормализовать и молча
 * отбрасываем неудачные: так одним путём разбираются простые списки,
 * adblock-правила (||domain^), списки URL и hosts-строки, где IP отсеивается
 * самим normalizeDomain.
 */
export function* extractDomains(line: string): Generator<string> {
	const s = stripComment(line);
	if (!s) return;

	for (const token of s.split(SPACE_RUN_RE)) {
		const domain = normalizeDomain(token);
		if (domain) yield domain;
	}
}

// Загружаем текст источника; ошибка прерывает весь прогон.
async function loadSource(url: string, ctx: FetchContext): Promise<string> {
	try {
		return await ctx.fetchFn(url, ctx.timeoutMs);
	} catch (err) {
		throw new Error(`failed to fetch ${url}: ${errorMessage(err)}`);
	}
}

// Собираем уникальные домены со всех источников, строго по очереди.
export async function collectDomains(
	sources: string[],
	ctx: FetchContext,
): Promise<DomainLoadResult> {
	const result: DomainLoadResult = {
		domains: new Set<string>(),
		sources: [],
	};

	for (const url of sources) {
		const text = await loadSource(url, ctx);
		const stats: SourceStats = { url, lines: 0, hosts: 0, domains: 0 };

		for (const line of splitLines(text)) {
			stats.lines++;

			const cleaned = stripComment(line);
			if (!cleaned) continue;
			if (detectLineMode(cleaned) === "hosts") stats.hosts++;

			for (const domain of extractDomains(cleaned)) {
				stats.domains++;
				result.domains.add(domain);
			}
		}

		console.log(
			`[fetch] ${url}: ${stats.lines} line(s)` +
				(stats.hosts ? ` (hosts=${stats.hosts})` : "") +
				`, ${stats.domains} domain(s)`,
		);
		result.sources.push(stats);
	}

	return result;
}

// Удобный конструктор контекста загрузки.
export function createFetchContext(timeoutMs: number, fetchFn?: FetchFn): FetchContext {
	return { timeoutMs, fetchFn: fetchFn ?? httpGetText };
}
