/**
 * Library entry point
 */

export type {
    AnswerKeyResult,
    AnswerList,
    ContentFragment,
    FetchOptions,
    Page,
    SectionListResult,
    SectionTitle,
    SolutionResult,
    TestInfo,
    UserAgentStrategy,
} from "./types";
export { SEPARATOR } from "./types";

export { ConfigError, InvalidTestError, NetworkError, PromptCancelledError } from "./errors";
export { loadConfig, toFetchOptions, type AppConfig } from "./config";

export { extractAnswers } from "./extraction/answers";
export {
    extractSection,
    hasReadableContent,
    listSections,
    type MathConverter,
} from "./extraction/sections";
export { loadPage } from "./extraction/page";
export { latexToText } from "./latex/convert";

export {
    FIRST_TEST_YEAR,
    TEST_CATALOG,
    availableTests,
    latestTestYear,
    resolveTestType,
} from "./wiki/catalog";
export { WIKI_BASE_URL, buildAnswerKeyUrl, buildProblemUrl } from "./wiki/urls";
export { fetchHtml, fetchWikiPage } from "./wiki/fetcher";

export {
    getAnswerKey,
    getSolution,
    getSolutionSections,
    readSolution,
    resolveAnswerKey,
    type LookupOptions,
} from "./lookup";
export {
    formatAnswers,
    formatSections,
    renderFragments,
    renderParagraphs,
    testLabel,
} from "./output/format";
