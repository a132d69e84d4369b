export const CLIENT_INDICES = ['1', '2', '3', '4', '5', '6', '7'] as const;

export const FEED_TYPES = ['crumbs', 'pellets', 'day old chicks', 'layer mash'] as const;

export const LOCATIONS = ['matangi', 'kitengela', "mihang'o"] as const;

const SPOKEN_DIGITS = ['one', 'two', 'three', 'four', 'five', 'six', 'seven'];
const COMMON_AMOUNTS = ['500', '1000', '2000', '1200'];

// Passed verbatim to the speech provider as a recognition context.
export const PHRASE_HINTS: readonly string[] = [
    ...FEED_TYPES,
    'debt', 'overpaid', 'client', 'price', 'location',
    ...LOCATIONS,
    ...SPOKEN_DIGITS,
    ...COMMON_AMOUNTS,
    'delivered'
];
