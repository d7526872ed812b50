import fs from "node:fs";
import http from "node:http";
import https from "node:https";
import { splitLines, trimSpace } from "./utils";

const USER_AGENT = "spamdomains-sync/1.0";
const MAX_REDIRECTS = 5;

const utf8 = new TextDecoder("utf-8", { fatal: true });

// UTF-8, а если тело в нём невалидно, то Latin-1.
export function decodeBody(body: Buffer): string {
	try {
		return utf8.decode(body);
	} catch {
		return body.toString("latin1");
	}
}

// Загрузка текста по HTTP(S) с таймаутом, user-agent и переходом по редиректам.
export function httpGetText(
	url: string,
	timeoutMs: number,
	redirects = MAX_REDIRECTS,
): Promise<string> {
	return new Promise((resolve, reject) => {
		let target: URL;
		try {
			target = new URL(url);
		} catch {
			reject(new Error(`invalid url: ${url}`));
			return;
		}

		if (target.protocol !== "http:" && target.protocol !== "https:") {
			reject(new Error(`unsupported protocol ${target.protocol} for ${url}`));
			return;
		}

		const onResponse = (res: http.IncomingMessage) => {
			const status = res.statusCode ?? 0;
			const location = res.headers.location;

			if (status >= 300 && status < 400 && location) {
				res.resume();
				if (redirects <= 0) {
					reject(new Error(`too many redirects for ${url}`));
					return;
				}
				const next = new URL(location, target).toString();
				httpGetText(next, timeoutMs, redirects - 1).then(resolve, reject);
				return;
			}

			if (status >= 400) {
				res.resume();
				reject(new Error(`HTTP ${status} for ${url}`));
				return;
			}

			const chunks: Buffer[] = [];
			res.on("data", (chunk: Buffer) => {
				chunks.push(chunk);
			});
			res.on("end", () => resolve(decodeBody(Buffer.concat(chunks))));
			res.on("error", reject);
		};

		const options = {
			timeout: timeoutMs,
			headers: { "user-agent": USER_AGENT, accept: "text/plain,*/*" },
		};
		const req =
			target.protocol === "https:"
				? https.get(target, options, onResponse)
				: http.get(target, options, onResponse);

		req.on("timeout", () => req.destroy(new Error(`timeout after ${timeoutMs}ms for ${url}`)));
		req.on("error", reject);
	});
}

// Читаем файл источников: по URL на строку, пустые строки и # пропускаем.
export function readSourcesFile(filePath: string): string[] {
	if (!fs.existsSync(filePath)) return [];

	return splitLines(fs.readFileSync(filePath, "utf8"))
		.map(trimSpace)
		.filter((line) => line && !line.startsWith("#"));
}
