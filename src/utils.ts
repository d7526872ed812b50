// Пробельные символы: \s плюс разделители \x1c-\x1f и NEL (\x85).
const SPACE = "\\s\\x1c-\\x1f\\x85";

export const SPACE_RUN_RE = new RegExp(`[${SPACE}]+`);
const EDGE_SPACE_RE = new RegExp(`^[${SPACE}]+|[${SPACE}]+$`, "g");

// Границы строк: \r\n, \r, \n, \v, \f, \x1c-\x1e, NEL, U+2028 и U+2029.
const LINE_BREAK_RE = /\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029]/;

// Разбиваем текст на строки (BOM в начале снимаем); завершающий перевод строки не даёт пустой строки.
export function splitLines(text: string): string[] {
	const lines = text.replace(/^\uFEFF/, "").split(LINE_BREAK_RE);
	if (lines.length && lines[lines.length - 1] === "") lines.pop();
	return lines;
}

export function trimSpace(value: string): string {
	return value.replace(EDGE_SPACE_RE, "");
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
