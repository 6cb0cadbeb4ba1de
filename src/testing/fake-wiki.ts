/**
 * In-process stand-in for the wiki: a stubbed global fetch that serves fixed
 * pages by URL and answers 404 for anything else
 */

import { vi } from "vitest";

export const TEST_BASE_URL = "https://wiki.test/index.php";

export interface FakeWiki {
    /** Every URL fetched, in order */
    requested: string[];
}

export interface FakeSection {
    title: string;
    html: string;
}

export function stubWiki(pages: Record<string, string>): FakeWiki {
    const wiki: FakeWiki = { requested: [] };

    vi.stubGlobal("fetch", vi.fn(async (input: string | URL | Request) => {
        const url = typeof input === "string" ? input : input.toString();
        wiki.requested.push(url);

        const html = pages[url];
        if (html === undefined) {
            return new Response("Not found", { status: 404, statusText: "Not Found" });
        }
        return new Response(html, { status: 200 });
    }));

    return wiki;
}

/** Answer key page: an intro paragraph and the ordered answer list */
export function answerKeyPage(answers: string[]): string {
    const items = answers.map(answer => `<li>${answer}</li>`).join("\n");
    return `<div class="mw-parser-output">
<p>These are the answers.</p>
<ol>
${items}
</ol>
</div>`;
}

/** Problem page: generated table of contents, then one h2 per section */
export function problemPage(sections: FakeSection[]): string {
    const toc = sections
        .map((s, i) => `<li class="toclevel-1 tocsection-${i + 1}"><a href="#s${i + 1}"><span class="tocnumber">${i + 1}</span> <span class="toctext">${s.title}</span></a></li>`)
        .join("\n");
    const body = sections
        .map(s => `<h2><span class="mw-headline">${s.title}</span></h2>\n${s.html}`)
        .join("\n");

    return `<div class="mw-parser-output">
<div id="toc" class="toc"><div class="toctitle"><h2>Contents</h2></div>
<ul>
${toc}
</ul>
</div>
${body}
</div>`;
}
