/**
 * Line Formatter
 *
 * Renders a log line from a template by literal placeholder
 * substitution. Every occurrence of a placeholder is replaced;
 * anything that is not a known placeholder stays as written.
 *
 * `{level}` is always substituted last. The terminal and file sinks
 * render the same base line and differ only in the level text (styled
 * vs plain), so dispatch renders the base once and finishes it per sink
 * with `applyLevel`.
 */


/**
 * Values for the base placeholders.
 */
export interface LineFields {

    /** Replaces `{timestamp}` */
    timestamp: string

    /** Replaces `{module_path}` */
    modulePath: string

    /** Replaces `{message}` */
    message: string
}


/**
 * Value accepted in structured key/value pairs.
 */
export type PairValue = string | number | boolean | bigint | null | undefined


/**
 * Key/value pairs for structured logging.
 *
 * Output follows the container's iteration order, which for both
 * plain objects (string keys) and Maps is insertion order.
 */
export type LogPairs = Readonly<Record<string, PairValue>> | ReadonlyMap<string, PairValue>


/**
 * Replace every occurrence of `token` with `value`, literally.
 *
 * Unlike `String.prototype.replaceAll` with a string argument, `$`
 * sequences in `value` are not interpreted.
 */
export function replaceToken(text: string, token: string, value: string): string {

    return text.split(token).join(value)
}


/**
 * Substitute the base placeholders, leaving `{level}` in place.
 *
 * @example
 * ```typescript
 * renderBase('[{timestamp}] {level}: {message}', {
 *     timestamp: '2024-01-15 10:30:00',
 *     modulePath: 'app::db',
 *     message: 'Connected',
 * })
 * // '[2024-01-15 10:30:00] {level}: Connected'
 * ```
 */
export function renderBase(template: string, fields: LineFields): string {

    let line = replaceToken(template, '{timestamp}', fields.timestamp)
    line = replaceToken(line, '{module_path}', fields.modulePath)
    line = replaceToken(line, '{message}', fields.message)

    return line
}


/**
 * Substitute `{level}` with sink-specific level text.
 */
export function applyLevel(line: string, levelText: string): string {

    return replaceToken(line, '{level}', levelText)
}


/**
 * Render a complete line.
 *
 * @example
 * ```typescript
 * formatLine('{level} - {message}', { timestamp: '', modulePath: '', message: 'Test message' }, 'INFO')
 * // 'INFO - Test message'
 * ```
 */
export function formatLine(template: string, fields: LineFields, levelText: string): string {

    return applyLevel(renderBase(template, fields), levelText)
}


/**
 * Render one fragment per key/value pair and concatenate them.
 *
 * @example
 * ```typescript
 * renderPairs(' {key}={value}', { user: 'ada', attempts: 3 })
 * // ' user=ada attempts=3'
 * ```
 */
export function renderPairs(pairTemplate: string, pairs: LogPairs): string {

    let out = ''

    for (const [key, value] of pairEntries(pairs)) {

        const fragment = replaceToken(pairTemplate, '{key}', key)
        out += replaceToken(fragment, '{value}', String(value))
    }

    return out
}


/**
 * Substitute the base placeholders and append the pair fragments,
 * leaving `{level}` in place.
 */
export function renderStructuredBase(
    template: string,
    fields: LineFields,
    pairs: LogPairs,
    pairTemplate: string,
): string {

    return renderBase(template, fields) + renderPairs(pairTemplate, pairs)
}


/**
 * Render a complete structured line.
 *
 * @example
 * ```typescript
 * formatStructured('{level}: {message}', fields, { id: 7 }, ' {key}={value}', 'INFO')
 * // 'INFO: Saved id=7'
 * ```
 */
export function formatStructured(
    template: string,
    fields: LineFields,
    pairs: LogPairs,
    pairTemplate: string,
    levelText: string,
): string {

    return applyLevel(renderStructuredBase(template, fields, pairs, pairTemplate), levelText)
}


/**
 * Iterate pairs from either container type.
 */
function pairEntries(pairs: LogPairs): Iterable<[string, PairValue]> {

    if (isPairMap(pairs)) {

        return pairs.entries()
    }

    return Object.entries(pairs)
}


function isPairMap(pairs: LogPairs): pairs is ReadonlyMap<string, PairValue> {

    return pairs instanceof Map
}
