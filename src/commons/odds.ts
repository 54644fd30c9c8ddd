/**
 * Converts American odds ("+150", "-200") to a decimal multiplier.
 * Returns undefined for anything that is not a signed, non-zero integer line.
 */
export const americanToDecimal = (americanOdds: string): number | undefined => {
    const match = /^([+-])(\d+)$/.exec(americanOdds.trim());
    if (!match) {
        return undefined;
    }

    const value = parseInt(match[2], 10);
    if (value === 0) {
        return undefined;
    }

    return match[1] === '+' ? value / 100 + 1 : 100 / value + 1;
}

/**
 * Display string for a decimal multiplier. Presentation only, never fed back into scoring.
 */
export const decimalToAmerican = (decimalOdds: number): string => {
    if (decimalOdds >= 2.0) {
        return '+' + Math.round((decimalOdds - 1) * 100);
    }
    return '-' + Math.round(100 / (decimalOdds - 1));
}
