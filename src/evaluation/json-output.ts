// Разбор JSON из ответа LLM.

// Модели часто оборачивают JSON в ```json ... ``` или добавляют текст вокруг.
const CODE_FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

// Извлекает и парсит первый JSON-объект ответа.
export function parseLlmJson(text: string): unknown {
  const fenced = CODE_FENCE_PATTERN.exec(text);
  const candidate = fenced?.[1] ?? text;

  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');

  if (start === -1 || end < start) {
    throw new Error(`LLM output contains no JSON object: ${text.slice(0, 200)}`);
  }

  return JSON.parse(candidate.slice(start, end + 1));
}
