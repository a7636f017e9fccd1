/**
 * JSON Parser Utilities
 *
 * Extracts JSON from LLM responses which may contain
 * code fences, extra text, or malformed output.
 */

/**
 * Extract JSON block from LLM response content.
 * Handles:
 * - JSON wrapped in code fences (```json ... ```)
 * - Raw JSON objects
 * - JSON with leading text
 */
export const extractJsonBlock = (content: string): string => {
    const codeFenceMatch = content.match(/```(?:json)?([\s\S]*?)```/i);
    if (codeFenceMatch) {
        return codeFenceMatch[1].trim();
    }

    const jsonMatch = content.match(/\{[\s\S]*\}$/);
    if (jsonMatch) {
        return jsonMatch[0];
    }

    return content.trim();
};

/**
 * Substring from the first `{` to the last `}`, or null when the text
 * does not contain both in that order.
 */
export const extractBracedSpan = (content: string): string | null => {
    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');
    if (start < 0 || end < start) {
        return null;
    }
    return content.slice(start, end + 1);
};

/**
 * Safely parse JSON with error handling
 */
export const safeParseJson = (
    content: string,
): { data: unknown; error: string | null } => {
    try {
        const data: unknown = JSON.parse(content);
        return { data, error: null };
    } catch (error) {
        return {
            data: null,
            error: error instanceof Error ? error.message : 'Unknown parsing error',
        };
    }
};
