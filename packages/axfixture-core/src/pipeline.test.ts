import { describe, expect, it } from "vitest";
import { MalformedEscapeError, StructuralParseError } from "./errors.js";
import { nameBasedUuid } from "./nameUuid.js";
import { convertBytes, convertSource } from "./pipeline.js";
import { serializeDocument } from "./serializer.js";
import { TREE_ID_NAMESPACE } from "./treeAssembler.js";
import type { OutputDocument } from "./types.js";

const encoder = new TextEncoder();

const BUTTON =
    '{"id": 1, "internalRole": "button", "boundsX": 0, "boundsY": 0, "boundsWidth": 10, "boundsHeight": 20}';

describe("convertBytes", () => {
    it("should render a single node tree as indented JSON", () => {
        const treeId = nameBasedUuid(TREE_ID_NAMESPACE, "button.json");
        const expected = [
            "{",
            '  "nodes": [',
            "    [",
            "      1,",
            "      {",
            '        "id": 1,',
            '        "role": "button",',
            '        "bounds": {',
            '          "rect": {',
            '            "left": 0,',
            '            "top": 0,',
            '            "width": 10,',
            '            "height": 20',
            "          }",
            "        }",
            "      }",
            "    ]",
            "  ],",
            '  "tree": {',
            `    "id": "${treeId}",`,
            '    "sourceStringEncoding": "utf16"',
            "  },",
            '  "root": 1',
            "}",
            "",
        ].join("\n");

        expect(convertBytes(encoder.encode(BUTTON), "button.json")).toBe(expected);
    });

    it("should repair percent-escapes before parsing", () => {
        const input = encoder.encode(BUTTON.replace('"button"', '"button", "name": "caf%C3%A9"'));
        const doc = convertSource(input, "out.json");
        expect(doc.nodes[0][1].name).toBe("café");
    });

    it("should abort on a malformed escape", () => {
        const input = encoder.encode(BUTTON.replace('"button"', '"button", "name": "%G1"'));
        expect(() => convertBytes(input, "out.json")).toThrow(MalformedEscapeError);
    });

    it("should abort on invalid JSON", () => {
        expect(() => convertBytes(encoder.encode("{"), "out.json")).toThrow(StructuralParseError);
    });
});

describe("serializeDocument", () => {
    const doc: OutputDocument = {
        nodes: [
            [
                1,
                {
                    id: 1,
                    role: "staticText",
                    bounds: { rect: { left: 0, top: 0, width: 1, height: 1 } },
                    name: "café 😀",
                },
            ],
        ],
        tree: { id: "00000000-0000-5000-8000-000000000000", sourceStringEncoding: "utf16" },
        root: 1,
    };

    it("should escape non-ASCII characters", () => {
        const lines = serializeDocument(doc).split("\n");
        expect(lines).toContain('        "name": "caf\\u00e9 \\ud83d\\ude00"');
    });

    it("should end with a newline", () => {
        expect(serializeDocument(doc).endsWith("}\n")).toBe(true);
    });
});
