import fs from "fs";
import os from "os";
import path from "path";

import { DEFAULT_CONFIG, loadConfigFile, parseConfig, resolveConfig } from "../src/config";

describe("parseConfig", () => {
    test("keeps known fields and normalizes extensions", () => {
        expect(
            parseConfig({
                extensions: ["rs", ".ts"],
                exclude: ["target"],
                markers: ["PERF"],
                trivialPhrases: ["obvious"],
                shortCommentLength: 10,
                headerLines: 3,
                unknown: true
            })
        ).toEqual({
            extensions: [".rs", ".ts"],
            exclude: ["target"],
            markers: ["PERF"],
            trivialPhrases: ["obvious"],
            shortCommentLength: 10,
            headerLines: 3
        });
    });

    test("rejects a non-object", () => {
        expect(() => parseConfig([])).toThrow("Config must be a JSON object");
    });

    test("rejects a list of non-strings", () => {
        expect(() => parseConfig({ exclude: ["a", 1] })).toThrow(
            "Invalid field: exclude (must be an array of strings)"
        );
    });

    test("rejects a negative or fractional count", () => {
        expect(() => parseConfig({ shortCommentLength: -1 })).toThrow(
            "Invalid field: shortCommentLength (must be a non-negative integer)"
        );
        expect(() => parseConfig({ headerLines: 1.5 })).toThrow("Invalid field: headerLines");
    });
});

describe("resolveConfig", () => {
    test("returns the defaults without layers", () => {
        expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    });

    test("lets later layers win field by field", () => {
        const config = resolveConfig({ exclude: ["a"], shortCommentLength: 20 }, { exclude: ["b"] });

        expect(config.exclude).toEqual(["b"]);
        expect(config.shortCommentLength).toBe(20);
        expect(config.extensions).toEqual([".rs"]);
        expect(config.markers).toEqual(DEFAULT_CONFIG.markers);
    });
});

describe("loadConfigFile", () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "comment-trim-config-"));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    test("reads JSON with comments", async () => {
        const file = path.join(dir, "comment-trim.config.json");
        fs.writeFileSync(
            file,
            [
                "{",
                "  // skip generated bindings",
                '  "exclude": ["bindings"],',
                '  /* shorter threshold */ "shortCommentLength": 8',
                "}"
            ].join("\n")
        );

        await expect(loadConfigFile(file, true)).resolves.toEqual({
            exclude: ["bindings"],
            shortCommentLength: 8
        });
    });

    test("returns an empty config for an optional missing file", async () => {
        await expect(loadConfigFile(path.join(dir, "absent.json"), false)).resolves.toEqual({});
    });

    test("fails for a required missing file", async () => {
        const file = path.join(dir, "absent.json");

        await expect(loadConfigFile(file, true)).rejects.toThrow(`Config file not found: ${file}`);
    });

    test("fails on invalid JSON", async () => {
        const file = path.join(dir, "bad.json");
        fs.writeFileSync(file, "{ exclude: }");

        await expect(loadConfigFile(file, true)).rejects.toThrow(/^Invalid JSON in config file: /);
    });

    test("names the file of an invalid field", async () => {
        const file = path.join(dir, "bad.json");
        fs.writeFileSync(file, '{ "markers": "TODO" }');

        await expect(loadConfigFile(file, false)).rejects.toThrow(
            `Invalid field: markers (must be an array of strings) in ${file}`
        );
    });
});
