import { XMLParser } from "fast-xml-parser";

const parser = new XMLParser({
    ignoreAttributes: true,
    removeNSPrefix: true,
    parseTagValue: false,
    trimValues: true,
    isArray: (name) => name === "response"
});

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

// text content of an element, which the parser gives as a string or as { "#text": ... }
function textOf(value: unknown): string | undefined {
    if (typeof value === "string") return value;
    if (isRecord(value) && typeof value["#text"] === "string") return value["#text"];
    return undefined;
}

/**
 * Extract the href of every `DAV:response` element of a multistatus body, in
 * document order. Responses without an href are ignored.
 */
export function parseMultistatusHrefs(xml: string): string[] {
    const document: unknown = parser.parse(xml);
    if (!isRecord(document) || !("multistatus" in document)) {
        throw new Error("Response body is not a DAV:multistatus document");
    }

    // an empty <multistatus/> parses to ""
    const multistatus = document.multistatus;
    if (!isRecord(multistatus)) return [];

    const responses = multistatus.response;
    if (!Array.isArray(responses)) return [];

    const hrefs: string[] = [];
    for (const response of responses) {
        if (!isRecord(response)) continue;
        const href = textOf(response.href);
        if (href) hrefs.push(href);
    }
    return hrefs;
}
