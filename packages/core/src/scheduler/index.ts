/**
 * Cron Expressions
 *
 * Parsing and validation of standard 5-field cron expressions
 * (minute hour day-of-month month day-of-week). Month and weekday fields take
 * three-letter names (JAN-DEC, SUN-SAT), and the usual `@daily`-style macros
 * are expanded. Workflow triggers are checked against these before a
 * schedule is accepted.
 *
 * @module @nodeflow/core/scheduler
 */

// =============================================================================
// Cron Utilities
// =============================================================================

/**
 * Parsed cron expression fields
 */
export interface CronParts {
  minute: string;
  hour: string;
  dayOfMonth: string;
  month: string;
  dayOfWeek: string;
}

interface FieldBounds {
  min: number;
  max: number;
  /** Names for consecutive values starting at `min` */
  names?: readonly string[];
}

const FIELD_ORDER = ['minute', 'hour', 'dayOfMonth', 'month', 'dayOfWeek'] as const;

const FIELD_BOUNDS: Record<keyof CronParts, FieldBounds> = {
  minute: { min: 0, max: 59 },
  hour: { min: 0, max: 23 },
  dayOfMonth: { min: 1, max: 31 },
  month: {
    min: 1,
    max: 12,
    names: ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'],
  },
  // 7 is accepted as Sunday
  dayOfWeek: { min: 0, max: 7, names: ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'] },
};

const MACROS: Record<string, string> = {
  '@yearly': '0 0 1 1 *',
  '@annually': '0 0 1 1 *',
  '@monthly': '0 0 1 * *',
  '@weekly': '0 0 * * 0',
  '@daily': '0 0 * * *',
  '@midnight': '0 0 * * *',
  '@hourly': '0 * * * *',
};


/**
 * Parse a cron expression string into parts. Macros such as `@hourly` are
 * expanded to their five fields.
 */
export function parseCron(expression: string): CronParts | null {
  const trimmed = expression.trim();
  const macro = Object.hasOwn(MACROS, trimmed.toLowerCase()) ? MACROS[trimmed.toLowerCase()] : undefined;
  const parts = (macro ?? trimmed).split(/\s+/);
  if (parts.length !== 5) {
    return null;
  }

  const [minute, hour, dayOfMonth, month, dayOfWeek] = parts;
  return { minute, hour, dayOfMonth, month, dayOfWeek };
}

const INTEGER = /^\d+$/;

function parseValue(token: string, bounds: FieldBounds): number | undefined {
  if (INTEGER.test(token)) return parseInt(token, 10);
  const index = bounds.names?.indexOf(token.toUpperCase()) ?? -1;
  return index >= 0 ? bounds.min + index : undefined;
}

function isValidField(field: string, bounds: FieldBounds): boolean {
  return field.split(',').every((item) => {
    const [range, step, ...extra] = item.split('/');
    if (extra.length > 0) return false;
    if (step !== undefined && (!INTEGER.test(step) || parseInt(step, 10) === 0)) {
      return false;
    }
    if (range === '*') return true;

    const [start, end, ...rest] = range.split('-');
    if (rest.length > 0) return false;
    const low = parseValue(start, bounds);
    if (low === undefined || low < bounds.min || low > bounds.max) return false;
    if (end === undefined) return true;
    const high = parseValue(end, bounds);
    return high !== undefined && high >= low && high <= bounds.max;
  });
}

/**
 * Check that every field of a cron expression is well formed and in range
 */
export function isValidCron(expression: string): boolean {
  const cron = parseCron(expression);
  if (!cron) return false;

  return FIELD_ORDER.every((key) => isValidField(cron[key], FIELD_BOUNDS[key]));
}
