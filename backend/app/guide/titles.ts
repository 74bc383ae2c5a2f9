const INVALID_PATH_CHARS = /[\\/:*?"<>|]/g;
const CONTROL_CHARS = /[\u0000-\u001f]/g;

/**
 * DVR clients build recording paths from titles, so control characters and
 * characters Windows/exFAT reject become spaces.
 */
export function sanitizeTitle(text: string): string {
    if (!text) return '';
    return text
        .replace(CONTROL_CHARS, ' ')
        .replace(INVALID_PATH_CHARS, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

export function channelTitle(venueName: string, surfaceName: string): string {
    return sanitizeTitle(`${venueName} - ${surfaceName}`);
}
