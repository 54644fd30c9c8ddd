import { RecommendationCategory } from '../recommendations/interfaces/recommendation.interface';

export const groupBy = <T>(data: T[], key: (item: T) => string): Record<string, T[]> => {
    return data.reduce(function (r: Record<string, T[]>, a: T) {
        const k = key(a);
        r[k] = r[k] || [];
        r[k].push(a);
        return r;
    }, Object.create(null));
}

// single sport name, or "<n> sports" for a mixed grouping
export const countItem = <T>(items: T[], key: (item: T) => string, text: string): string => {
    const res = groupBy(items, key);
    const noOf = Object.keys(res).length
    if (noOf > 1) {
        return noOf + ' ' + text;
    } else if (items.length > 0) {
        return key(items[0]);
    }
    return '';
}

export const recommendationType = (category: RecommendationCategory, legCount: number): string => {
    switch (category) {
        case 'single_bets':
            return 'single bet';
        case 'favorite_parlays':
            return legCount + '-leg favorite parlay';
        default:
            return getParlayName(legCount);
    }
}

const getParlayName = (legCount: number): string => {
    switch (legCount) {
        case 1:
            return 'single bet';
        default:
            return legCount + '-leg parlay';
    }
}
