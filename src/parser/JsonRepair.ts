/**
 * JsonRepair — Textual Fixes for the Vendor's Error Samples
 *
 * Error-response samples in the documentation are often not valid JSON:
 * the `__invalid` key goes unquoted, and single-field bodies drop their
 * enclosing braces. Each repair is applied to the raw block text before
 * `JSON.parse`.
 *
 * @module
 */

/** One named text rewrite, applied before decoding */
export interface JsonRepair {
    readonly name: string;
    readonly apply: (text: string) => string;
}

/** `__invalid:` / `"__invalid:` → `"__invalid":` */
export const quoteInvalidKey: JsonRepair = {
    name: 'quote-invalid-key',
    apply: text => text.replace(/"?__invalid"?\s*:/g, '"__invalid":'),
};

/** `"success": false` → `{"success": false}` */
export const wrapInBraces: JsonRepair = {
    name: 'wrap-in-braces',
    apply: text => (text.startsWith('{') ? text : `{${text}}`),
};

/** Repairs applied to every error-response block, in order */
export const ERROR_BLOCK_REPAIRS: readonly JsonRepair[] = [quoteInvalidKey, wrapInBraces];

/**
 * Apply repairs in order.
 *
 * @param text - A trimmed code block body
 */
export function repairErrorBlock(text: string, repairs: readonly JsonRepair[] = ERROR_BLOCK_REPAIRS): string {
    return repairs.reduce((current, repair) => repair.apply(current), text);
}
