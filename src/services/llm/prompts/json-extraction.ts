export const JSON_EXTRACTION_SYSTEM_PROMPT = 'You are a strict JSON generator.';

export const JSON_REPROMPT_SUFFIX = `

Your previous answer could not be parsed as JSON.
Respond with exactly one JSON object and nothing else: no prose, no markdown fences, no comments.`;
