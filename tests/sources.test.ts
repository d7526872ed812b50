import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { decodeBody, httpGetText, readSourcesFile } from "../src/sources";

// Локальный HTTP-сервер вместо удалённых списков.
function createListServer(): http.Server {
	return http.createServer((req, res) => {
		switch (req.url) {
			case "/list.txt":
				res.setHeader("content-type", "text/plain; charset=utf-8");
				res.end("ads.example.net\n");
				return;
			case "/latin1.txt":
				res.end(Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x0a]));
				return;
			case "/headers":
				res.end(`${req.headers["user-agent"]}|${req.headers.accept}`);
				return;
			case "/redirect":
				res.statusCode = 302;
				res.setHeader("location", "/list.txt");
				res.end();
				return;
			case "/loop":
				res.statusCode = 301;
				res.setHeader("location", "/loop");
				res.end();
				return;
			case "/slow":
				// no response
				return;
			default:
				res.statusCode = 404;
				res.end("not found\n");
		}
	});
}

describe("httpGetText", () => {
	const server = createListServer();
	let base = "";

	beforeAll(async () => {
		await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
		const address = server.address();
		if (!address || typeof address === "string") throw new Error("server has no port");
		base = `http://127.0.0.1:${address.port}`;
	});

	afterAll(async () => {
		server.closeAllConnections();
		await new Promise<void>((resolve) => server.close(() => resolve()));
	});

	it("возвращает тело ответа", async () => {
		await expect(httpGetText(`${base}/list.txt`, 1000)).resolves.toBe("ads.example.net\n");
	});

	it("отправляет user-agent и accept", async () => {
		await expect(httpGetText(`${base}/headers`, 1000)).resolves.toBe(
			"spamdomains-sync/1.0|text/plain,*/*",
		);
	});

	it("переходит по редиректам", async () => {
		await expect(httpGetText(`${base}/redirect`, 1000)).resolves.toBe("ads.example.net\n");
	});

	it("ограничивает число редиректов", async () => {
		await expect(httpGetText(`${base}/loop`, 1000)).rejects.toThrow(
			`too many redirects for ${base}/loop`,
		);
	});

	it("декодирует Latin-1, если тело не UTF-8", async () => {
		await expect(httpGetText(`${base}/latin1.txt`, 1000)).resolves.toBe("café\n");
	});

	it("падает на HTTP-ошибках", async () => {
		await expect(httpGetText(`${base}/missing`, 1000)).rejects.toThrow(
			`HTTP 404 for ${base}/missing`,
		);
	});

	it("падает по таймауту", async () => {
		await expect(httpGetText(`${base}/slow`, 50)).rejects.toThrow(
			`timeout after 50ms for ${base}/slow`,
		);
	});

	it("не поддерживает другие протоколы", async () => {
		await expect(httpGetText("ftp://lists.example/hosts", 1000)).rejects.toThrow(
			"unsupported protocol ftp: for ftp://lists.example/hosts",
		);
	});
});

describe("decodeBody", () => {
	it("читает UTF-8 и откатывается на Latin-1", () => {
		expect(decodeBody(Buffer.from("bücher.example", "utf8"))).toBe("bücher.example");
		expect(decodeBody(Buffer.from([0x62, 0xfc, 0x63, 0x68, 0x65, 0x72]))).toBe("bücher");
	});
});

describe("readSourcesFile", () => {
	it("пропускает пустые строки и комментарии", () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "spamdomains-sources-"));
		const file = path.join(dir, "sources.txt");
		fs.writeFileSync(
			file,
			"# lists\n\nhttps://lists.example/hosts.txt\n  https://lists.example/adblock.txt  \n  # off\n",
		);

		expect(readSourcesFile(file)).toEqual([
			"https://lists.example/hosts.txt",
			"https://lists.example/adblock.txt",
		]);

		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("возвращает пустой список, если файла нет", () => {
		expect(readSourcesFile(path.join(os.tmpdir(), "spamdomains-no-such-file.txt"))).toEqual([]);
	});
});
