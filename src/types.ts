import type { CheerioAPI } from "cheerio";

/** A parsed wiki page. Extractors only read from it. */
export type Page = CheerioAPI;

/** One answer per question, 0-indexed (question n lives at n - 1) */
export type AnswerList = string[];

export type SectionTitle = string;

/** Prose, converted math, or the paragraph separator */
export type ContentFragment = string;

/** Appended after every sibling node of a section */
export const SEPARATOR: ContentFragment = "\n";

export type UserAgentStrategy = "rotate" | "fixed";

export interface FetchOptions {
    /** Request timeout in ms (default: 10000) */
    timeout?: number;
    /** Random browser user agent per request, or always the same one */
    userAgentStrategy?: UserAgentStrategy;
    /** User agent sent by the "fixed" strategy */
    userAgent?: string;
}

export interface TestInfo {
    /** Identifier users type, e.g. "10A" or "AIME_I" */
    type: string;
    startYear: number;
    /** null while the test is still running */
    endYear: number | null;
    description: string;
    /** Segment used in wiki page names, e.g. "AMC_10A" */
    urlFormat: string;
}

export interface AnswerKeyResult {
    url: string;
    test: TestInfo;
    year: number;
    /** null when the page was fetched but held no answer list */
    answers: AnswerList | null;
}

export interface SectionListResult {
    url: string;
    question: number;
    /** Kept so a chosen section can be read without fetching again */
    page: Page;
    sections: SectionTitle[];
}

export interface SolutionResult {
    url: string;
    question: number;
    /** 1-based, as shown to users */
    sectionNumber: number;
    title: SectionTitle;
    fragments: ContentFragment[];
}
