/**
 * SSML document construction for speech synthesis.
 */

const XML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export interface SsmlOptions {
  readonly text: string;
  readonly voice: string;
  readonly language: string;
  /** Relative speaking rate, 1.0 is normal. */
  readonly rate?: number;
}

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);
}

/**
 * Express a relative rate as the signed percentage SSML expects,
 * e.g. 1.25 becomes "+25%" and 0.8 becomes "-20%".
 */
export function formatRate(rate: number): string {
  const percent = Math.round((rate - 1) * 100);
  return percent >= 0 ? `+${percent}%` : `${percent}%`;
}

export function buildSsml(options: Readonly<SsmlOptions>): string {
  const { text, voice, language, rate } = options;

  let content = escapeXml(text);
  if (rate !== undefined && rate !== 1) {
    content = `<prosody rate="${formatRate(rate)}">${content}</prosody>`;
  }

  return (
    `<speak version="1.0" xmlns="http://www.w3.org/2001/10/synthesis" xml:lang="${escapeXml(language)}">` +
    `<voice name="${escapeXml(voice)}">${content}</voice>` +
    `</speak>`
  );
}
