/**
 * Settings Zod schemas and validation.
 *
 * Settings describe the log file and output properties of a logger.
 * Every field has a default, so an empty file (or none) is valid.
 */
import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Boolean that also takes 'true' / 'false' strings from the environment.
 */
const FlagSchema = z.preprocess(
    (value) => (value === 'true' ? true : value === 'false' ? false : value),
    z.boolean(),
);

/**
 * Non-negative integer, coerced from strings.
 */
const CountSchema = z.coerce.number().int().min(0);

/**
 * Timestamp layout.
 */
const ClockSchema = z.enum(['datetime', 'date', 'time']);

// ─────────────────────────────────────────────────────────────
// Section Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Log file target.
 */
const FileSectionSchema = z.object({
    path: z.string().min(1, 'File path must not be empty').optional(),
    append: FlagSchema.default(true),
    session: z.string().default(''),
});

/**
 * Queue behavior.
 */
const QueueSectionSchema = z.object({
    max: z.coerce.number().int().min(1, 'Queue maximum must be at least 1').default(10),
});

/**
 * Message layout.
 */
const FormatSectionSchema = z.object({
    color: FlagSchema.default(true),
    timestamp: FlagSchema.default(true),
    clock: ClockSchema.default('datetime'),
    indent: CountSchema.default(0),
    align: FlagSchema.default(true),
});

/**
 * Line wrapping per destination.
 */
const WrapSectionSchema = z.object({
    tty: FlagSchema.default(true),
    file: FlagSchema.default(true),
});

/**
 * Maximum line widths per destination, 0 = automatic.
 */
const WidthSectionSchema = z.object({
    tty: CountSchema.default(0),
    file: CountSchema.default(0),
});

// ─────────────────────────────────────────────────────────────
// Main Settings Schema
// ─────────────────────────────────────────────────────────────

/**
 * Complete settings schema.
 */
export const SettingsSchema = z.object({
    file: FileSectionSchema.default({}),
    queue: QueueSectionSchema.default({}),
    format: FormatSectionSchema.default({}),
    wrap: WrapSectionSchema.default({}),
    width: WidthSectionSchema.default({}),
});

// ─────────────────────────────────────────────────────────────
// Type Exports
// ─────────────────────────────────────────────────────────────

export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Error
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when settings validation fails.
 */
export class SettingsValidationError extends Error {

    override readonly name = 'SettingsValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Parse and validate settings, filling in defaults.
 *
 * @throws SettingsValidationError if validation fails
 *
 * @example
 * ```typescript
 * const settings = parseSettings({ queue: { max: 50 } })
 * // settings.format.clock === 'datetime' (default)
 * ```
 */
export function parseSettings(settings: unknown): Settings {

    const result = SettingsSchema.safeParse(settings);

    if (!result.success) {

        const firstIssue = result.error.issues[0];
        const field = firstIssue?.path.join('.') || 'unknown';

        throw new SettingsValidationError(
            `Invalid setting '${field}': ${firstIssue?.message ?? 'validation failed'}`,
            field,
            result.error.issues,
        );

    }

    return result.data;

}
