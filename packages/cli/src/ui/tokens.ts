/**
 * Layout tokens shared by components.
 *
 * @module ui/tokens
 */

export const tokens = {
    borders: {
        style: 'round',
    },
    spacing: {
        section: 1,
        indent: 2,
    },
    /** Sample rows shown before a listing is cut off */
    limits: {
        samples: 10,
    },
} as const;
