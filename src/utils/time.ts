/**
 * Parse a clock string (HH:MM or HH:MM:SS) into minutes since midnight.
 * Seconds become fractions of a minute.
 *
 * @param time - The time string to parse (e.g., "21:30", "09:05:30")
 * @returns Total minutes, or null when the string is not a valid clock time
 */
export function parseTimeToMinutes(time: string): number | null {
    const match = time.trim().match(/^(\d{1,2}):(\d{2})(?::(\d{2}))?$/);
    if (!match) return null;

    const hours = parseInt(match[1], 10);
    const minutes = parseInt(match[2], 10);
    const seconds = match[3] ? parseInt(match[3], 10) : 0;
    if (hours > 23 || minutes > 59 || seconds > 59) return null;

    return hours * 60 + minutes + (seconds / 60);
}

/**
 * Format minutes since midnight as HH:MM, wrapping past midnight.
 */
export function formatMinutes(total: number): string {
    const wrapped = ((Math.round(total) % 1440) + 1440) % 1440;
    const hours = Math.floor(wrapped / 60);
    const minutes = wrapped % 60;
    return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}
