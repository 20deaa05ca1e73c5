import { GameSettings } from './types';

/** Number of clues a freshly generated puzzle aims to keep. */
export const DEFAULT_TARGET_CLUES = 35;

/** Maximum number of snapshots the undo history holds before evicting the oldest. */
export const UNDO_CAPACITY = 200;

/**
 * Settings used when the presentation layer supplies none.
 */
export const DEFAULT_SETTINGS: GameSettings = {
    showHints: true,
};

/**
 * Merges partially specified settings over the defaults.
 * Keys the caller leaves undefined fall back to {@link DEFAULT_SETTINGS}.
 */
export function resolveSettings(settings: Partial<GameSettings> = {}): GameSettings {
    return {
        showHints: settings.showHints ?? DEFAULT_SETTINGS.showHints,
    };
}
