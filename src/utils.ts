export type Clock = () => Date;

export const DAY_MS = 24 * 60 * 60 * 1000;

export const systemClock: Clock = () => new Date();

export const sleep = async (ms: number) => {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
export const groupBy = <T>(items: T[], keyOf: (item: T) => string | number) => items.reduce<{[key: string]: T[]}>(
    (result, item) => ({
        ...result,
        [keyOf(item)]: [
            ...(result[keyOf(item)] || []),
            item,
        ],
    }),
    {},
);
export const addDays = (date: Date, days: number) => new Date(date.getTime() + days * DAY_MS);
export const displayName = (person: {firstName: string, lastName: string}) => `${person.firstName} ${person.lastName}`;
