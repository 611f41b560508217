/**
 * Trim free-text notes; blank notes are stored as absent.
 */
export function normalizeNotes(notes: string | undefined): string | undefined {
    const trimmed = notes?.trim();
    return trimmed ? trimmed : undefined;
}
