/**
 * Which competitions the wiki has answer keys for, and in which years
 */

import type { TestInfo } from "../types";

/** Earliest year any supported test was held (first AHSME) */
export const FIRST_TEST_YEAR = 1950;

export const TEST_CATALOG: readonly TestInfo[] = [
    {
        type: "AJHSME",
        startYear: 1985,
        endYear: 1998,
        description: "American Junior High School Mathematics Examination",
        urlFormat: "AJHSME",
    },
    {
        type: "AHSME",
        startYear: 1950,
        endYear: 1998,
        description: "American High School Mathematics Examination",
        urlFormat: "AHSME",
    },
    { type: "8", startYear: 1999, endYear: null, description: "AMC 8", urlFormat: "AMC_8" },
    { type: "10A", startYear: 2002, endYear: null, description: "AMC 10A", urlFormat: "AMC_10A" },
    { type: "10B", startYear: 2002, endYear: null, description: "AMC 10B", urlFormat: "AMC_10B" },
    // Single AMC 10 / AMC 12 before the A/B split
    { type: "10", startYear: 2000, endYear: 2001, description: "AMC 10", urlFormat: "AMC_10" },
    { type: "12A", startYear: 2002, endYear: null, description: "AMC 12A", urlFormat: "AMC_12A" },
    { type: "12B", startYear: 2002, endYear: null, description: "AMC 12B", urlFormat: "AMC_12B" },
    { type: "12", startYear: 2000, endYear: 2001, description: "AMC 12", urlFormat: "AMC_12" },
    {
        type: "AIME",
        startYear: 1983,
        endYear: 1999,
        description: "American Invitational Mathematics Examination",
        urlFormat: "AIME",
    },
    {
        type: "AIME_I",
        startYear: 2000,
        endYear: null,
        description: "American Invitational Mathematics Examination I",
        urlFormat: "AIME_I",
    },
    {
        type: "AIME_II",
        startYear: 2000,
        endYear: null,
        description: "American Invitational Mathematics Examination II",
        urlFormat: "AIME_II",
    },
];

/** Latest year the tool accepts: tests cannot have been held in the future */
export function latestTestYear(now: Date = new Date()): number {
    return now.getFullYear();
}

export function isOfferedIn(test: TestInfo, year: number): boolean {
    return test.startYear <= year && (test.endYear === null || year <= test.endYear);
}

/**
 * Tests held in the given year, in catalogue order
 */
export function availableTests(year: number): TestInfo[] {
    return TEST_CATALOG.filter(test => isOfferedIn(test, year));
}

/**
 * Resolve user input ("10a", " aime_i ") to a test held in that year, or null
 */
export function resolveTestType(year: number, input: string): TestInfo | null {
    const type = input.trim().toUpperCase();
    if (type === "") return null;
    return availableTests(year).find(test => test.type === type) ?? null;
}
