import { afterEach, describe, it, expect, vi } from "vitest";
import {
    getAnswerKey,
    getSolution,
    getSolutionSections,
    readSolution,
    resolveAnswerKey,
    type LookupOptions,
} from "../lookup";
import { InvalidTestError, NetworkError } from "../errors";
import { latestTestYear } from "../wiki/catalog";
import { TEST_BASE_URL, answerKeyPage, problemPage, stubWiki } from "../testing/fake-wiki";

const KEY_URL = `${TEST_BASE_URL}/2019_AMC_10A_Answer_Key`;
const PROBLEM_3_URL = `${TEST_BASE_URL}/2019_AMC_10A_Problems/Problem_3`;

const OPTIONS: LookupOptions = { baseUrl: TEST_BASE_URL, userAgentStrategy: "fixed" };

const PROBLEM_3 = problemPage([
    {
        title: "Problem",
        html: String.raw`<p>Compute <img class="latex" alt="$\frac{10}{2}$" src="/a.png">.</p>`,
    },
    {
        title: "Solution",
        html: String.raw`<p>Divide to get 5.</p>
<p>So the answer is <img class="latex" alt="$\textbf{(B) }5$" src="/b.png"></p>`,
    },
]);

afterEach(() => {
    vi.unstubAllGlobals();
});

describe("resolveAnswerKey", () => {
    it("builds the answer key URL for a held test", () => {
        const { url, test } = resolveAnswerKey(2019, " 10a ", OPTIONS);

        expect(url).toBe(KEY_URL);
        expect(test.type).toBe("10A");
    });

    it("uses the standalone page title for AIME", () => {
        expect(resolveAnswerKey(2005, "aime_ii", OPTIONS).url).toBe(
            `${TEST_BASE_URL}/2005_AIME_II_Answer_Key`
        );
    });

    it("rejects years before the first test", () => {
        expect(() => resolveAnswerKey(1949, "AHSME")).toThrow(
            new InvalidTestError(`Year must be between 1950 and ${latestTestYear()}, got 1949`)
        );
    });

    it("rejects years in the future", () => {
        const year = latestTestYear() + 1;

        expect(() => resolveAnswerKey(year, "10A")).toThrow(InvalidTestError);
    });

    it("caps the year with the given clock", () => {
        expect(() => resolveAnswerKey(2020, "10A", { now: new Date(2010, 0, 1) })).toThrow(
            "Year must be between 1950 and 2010, got 2020"
        );
        expect(resolveAnswerKey(2035, "10A", { baseUrl: TEST_BASE_URL, now: new Date(2040, 0, 1) }).url).toBe(
            `${TEST_BASE_URL}/2035_AMC_10A_Answer_Key`
        );
    });

    it("rejects a test type not held that year and lists the ones that were", () => {
        expect(() => resolveAnswerKey(2019, "AHSME")).toThrow(
            'Test type "AHSME" was not held in 2019. Available: 8, 10A, 10B, 12A, 12B, AIME_I, AIME_II'
        );
    });
});

describe("getAnswerKey", () => {
    it("fetches the answer key page and extracts the answers", async () => {
        const wiki = stubWiki({ [KEY_URL]: answerKeyPage(["C", "B", "E"]) });

        const result = await getAnswerKey(2019, "10A", OPTIONS);

        expect(wiki.requested).toEqual([KEY_URL]);
        expect(result.url).toBe(KEY_URL);
        expect(result.year).toBe(2019);
        expect(result.test.description).toBe("AMC 10A");
        expect(result.answers).toEqual(["C", "B", "E"]);
    });

    it("returns null answers when the page has no answer list", async () => {
        stubWiki({ [KEY_URL]: `<div class="mw-parser-output"><p>Nothing here</p></div>` });

        const result = await getAnswerKey(2019, "10A", OPTIONS);

        expect(result.answers).toBeNull();
    });

    it("rejects with NetworkError when the page is missing", async () => {
        stubWiki({});

        await expect(getAnswerKey(2019, "10A", OPTIONS)).rejects.toBeInstanceOf(NetworkError);
    });

    it("does not fetch for an invalid test", async () => {
        const wiki = stubWiki({});

        await expect(getAnswerKey(2019, "AJHSME", OPTIONS)).rejects.toBeInstanceOf(InvalidTestError);
        expect(wiki.requested).toEqual([]);
    });
});

describe("getSolutionSections", () => {
    it("lists the sections of the question's problem page", async () => {
        const wiki = stubWiki({ [PROBLEM_3_URL]: PROBLEM_3 });

        const problem = await getSolutionSections(KEY_URL, 3, OPTIONS);

        expect(wiki.requested).toEqual([PROBLEM_3_URL]);
        expect(problem.url).toBe(PROBLEM_3_URL);
        expect(problem.question).toBe(3);
        expect(problem.sections).toEqual(["Problem", "Solution"]);
    });

    it("rejects a question number below 1 without fetching", async () => {
        const wiki = stubWiki({});

        await expect(getSolutionSections(KEY_URL, 0, OPTIONS)).rejects.toThrow(
            "Question number must be a positive integer, got 0"
        );
        expect(wiki.requested).toEqual([]);
    });
});

describe("readSolution", () => {
    it("reads a section by its 1-based number", async () => {
        stubWiki({ [PROBLEM_3_URL]: PROBLEM_3 });
        const problem = await getSolutionSections(KEY_URL, 3, OPTIONS);

        expect(readSolution(problem, 1)).toEqual({
            url: PROBLEM_3_URL,
            question: 3,
            sectionNumber: 1,
            title: "Problem",
            fragments: ["\n", "Compute", "10/2", ".", "\n", "\n"],
        });
    });

    it("returns null for section numbers outside the list", async () => {
        stubWiki({ [PROBLEM_3_URL]: PROBLEM_3 });
        const problem = await getSolutionSections(KEY_URL, 3, OPTIONS);

        expect(readSolution(problem, 0)).toBeNull();
        expect(readSolution(problem, 3)).toBeNull();
        expect(readSolution(problem, 1.5)).toBeNull();
    });
});

describe("getSolution", () => {
    it("fetches the problem page and reads one section", async () => {
        stubWiki({ [PROBLEM_3_URL]: PROBLEM_3 });

        const solution = await getSolution(KEY_URL, 3, 2, OPTIONS);

        expect(solution?.title).toBe("Solution");
        expect(solution?.fragments).toEqual([
            "\n",
            "Divide to get 5.",
            "\n",
            "\n",
            "So the answer is",
            "(B) 5",
            "\n",
            "\n",
        ]);
    });
});
