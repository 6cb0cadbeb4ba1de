import { describe, it, expect } from "vitest";
import { extractAnswers } from "../answers";
import { loadPage } from "../page";

describe("extractAnswers", () => {
    it("returns answers in document order", () => {
        const page = loadPage(`
            <div class="mw-parser-output">
                <ol>
                    <li>C</li>
                    <li>B</li>
                    <li>E</li>
                </ol>
            </div>
        `);

        expect(extractAnswers(page)).toEqual(["C", "B", "E"]);
    });

    it("trims whitespace around each answer", () => {
        const page = loadPage(`
            <div class="mw-parser-output"><ol><li>  A  </li><li>
                750
            </li></ol></div>
        `);

        expect(extractAnswers(page)).toEqual(["A", "750"]);
    });

    it("uses the full text of items with nested markup", () => {
        const page = loadPage(`
            <div class="mw-parser-output"><ol><li><b>D</b></li><li><a href="#">0</a>42</li></ol></div>
        `);

        expect(extractAnswers(page)).toEqual(["D", "042"]);
    });

    it("skips empty items", () => {
        const page = loadPage(`
            <div class="mw-parser-output"><ol><li>A</li><li>   </li><li></li><li>B</li></ol></div>
        `);

        expect(extractAnswers(page)).toEqual(["A", "B"]);
    });

    it("collects items from every ordered list directly in the container", () => {
        const page = loadPage(`
            <div class="mw-parser-output">
                <ol><li>A</li></ol>
                <p>Note</p>
                <ol><li>B</li></ol>
            </div>
        `);

        expect(extractAnswers(page)).toEqual(["A", "B"]);
    });

    it("ignores ordered lists nested deeper in the container", () => {
        const page = loadPage(`
            <div class="mw-parser-output"><div><ol><li>A</li></ol></div></div>
        `);

        expect(extractAnswers(page)).toBeNull();
    });

    it("ignores unordered lists", () => {
        const page = loadPage(`
            <div class="mw-parser-output"><ul><li>A</li></ul></div>
        `);

        expect(extractAnswers(page)).toBeNull();
    });

    it("returns null when the content container is missing", () => {
        const page = loadPage(`<div class="content"><ol><li>A</li></ol></div>`);

        expect(extractAnswers(page)).toBeNull();
    });

    it("returns null when every item is empty", () => {
        const page = loadPage(`<div class="mw-parser-output"><ol><li> </li></ol></div>`);

        expect(extractAnswers(page)).toBeNull();
    });

    it("returns the same answers when called twice", () => {
        const page = loadPage(`<div class="mw-parser-output"><ol><li>A</li><li>B</li></ol></div>`);

        expect(extractAnswers(page)).toEqual(extractAnswers(page));
    });
});
