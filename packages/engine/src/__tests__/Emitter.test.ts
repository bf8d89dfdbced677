/**
 * @fileoverview Unit tests for dialect rendering and atomic emission
 *
 * Tests cover:
 * - Exact output of every dialect
 * - Omission of kinds a dialect cannot express
 * - loon-config template substitution
 * - Rendered output normalizes back to the same rules
 * - Atomic replacement on a real temporary directory
 *
 * @module @ruleboard/engine/__tests__/Emitter
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { parse as parseYaml } from "yaml";
import { emit, render } from "../emit/Emitter.js";
import { RULES_BEGIN_MARKER, RULES_END_MARKER } from "../emit/dialects.js";
import { writeFileAtomic } from "../emit/atomicWrite.js";
import type { Dialect, EmitContext, EmissionTarget } from "../contracts/Emitter.js";
import type { KnownFormat } from "../contracts/Format.js";
import { createRule, ruleKey, type MatchKind, type Rule } from "../contracts/Rule.js";
import { WriteError } from "../contracts/errors.js";
import { Normalizer } from "../normalize/Normalizer.js";

function rule(pattern: string, kind: MatchKind): Rule {
    const created = createRule(pattern, kind);
    if (!created) {
        throw new Error(`invalid test rule: ${pattern}`);
    }
    return created;
}

const RULES = [
    rule("ads.example.com", "EXACT"),
    rule("tracker.example.com", "SUFFIX"),
    rule("adservice", "KEYWORD"),
];

const CONTEXT: EmitContext = {
    title      : "Test rules",
    tag        : "AdBlock",
    sourceNames: ["A", "B"],
};

const ROUND_TRIPS: Array<[Dialect, KnownFormat]> = [
    ["loon-list", "SURGE_LOON"],
    ["loon-rules", "SURGE_LOON"],
    ["domains", "PLAIN"],
    ["hosts", "HOSTS"],
    ["adblock", "ADBLOCK"],
];

const target = (dialect: Dialect, template?: string): EmissionTarget => ({
    dialect,
    destination: "/unused/out.txt",
    ...(template !== undefined ? { template } : {}),
});

describe("render", () => {
    // Scenario: Merged Loon list with header
    it("should render loon-list with a comment header", () => {
        expect(render(RULES, target("loon-list"), CONTEXT)).toEqual({
            content: [
                "# Test rules",
                "# Rules: 3",
                "# Sources: A, B",
                "",
                "DOMAIN,ads.example.com",
                "DOMAIN-SUFFIX,tracker.example.com",
                "DOMAIN-KEYWORD,adservice",
                "",
            ].join("\n"),
            written: 3,
            omitted: 0,
        });
    });

    // Scenario: Rules-only list carries the policy
    it("should render loon-rules with the REJECT policy", () => {
        const { content } = render(RULES, target("loon-rules"), { ...CONTEXT, sourceNames: [] });

        expect(content).toBe([
            "# Test rules",
            "# Rules: 3",
            "",
            "DOMAIN,ads.example.com,REJECT",
            "DOMAIN-SUFFIX,tracker.example.com,REJECT",
            "DOMAIN-KEYWORD,adservice,REJECT",
            "",
        ].join("\n"));
    });

    // Scenario: Config rules are delimited inside the template
    it("should substitute loon-config rules into the template", () => {
        const template = "[General]\nipv6 = false\n\n[Rule]\n{{RULES}}\nFINAL,DIRECT\n\n";
        const { content } = render(RULES, target("loon-config", template), CONTEXT);

        expect(content).toBe([
            "[General]",
            "ipv6 = false",
            "",
            "[Rule]",
            RULES_BEGIN_MARKER,
            "DOMAIN,ads.example.com,policy=REJECT,tag=AdBlock,enabled=true",
            "DOMAIN-SUFFIX,tracker.example.com,policy=REJECT,tag=AdBlock,enabled=true",
            "DOMAIN-KEYWORD,adservice,policy=REJECT,tag=AdBlock,enabled=true",
            RULES_END_MARKER,
            "FINAL,DIRECT",
            "",
        ].join("\n"));
    });

    // Scenario: Missing or placeholder-less templates are rejected
    it("should reject loon-config without a usable template", () => {
        expect(() => render(RULES, target("loon-config"), CONTEXT)).toThrow("loon-config target requires a template");
        expect(() => render(RULES, target("loon-config", "[Rule]\n"), CONTEXT)).toThrow("Template has no {{RULES}} line");
    });

    // Scenario: Clash rule provider, keywords omitted
    it("should render clash-provider as a YAML payload", () => {
        const { content, written, omitted } = render(RULES, target("clash-provider"), CONTEXT);

        expect(written).toBe(2);
        expect(omitted).toBe(1);
        expect(content.startsWith("# Test rules\n# Rules: 2\n# Sources: A, B\n# behavior: domain\npayload:\n")).toBe(true);
        expect(parseYaml(content)).toEqual({ payload: ["ads.example.com", "+.tracker.example.com"] });
    });

    // Scenario: Domain list marks suffixes with a leading dot
    it("should render domains with leading dots for suffix rules", () => {
        const { content, omitted } = render(RULES, target("domains"), CONTEXT);

        expect(content.split("\n").slice(4)).toEqual(["ads.example.com", ".tracker.example.com", ""]);
        expect(omitted).toBe(1);
    });

    // Scenario: Hosts output can only express exact names
    it("should render hosts with EXACT rules only", () => {
        const { content, written, omitted } = render(RULES, target("hosts"), CONTEXT);

        expect(content.split("\n").slice(4)).toEqual(["0.0.0.0 ads.example.com", ""]);
        expect(written).toBe(1);
        expect(omitted).toBe(2);
    });

    // Scenario: Adblock output uses "!" comments
    it("should render adblock with an adblock header", () => {
        const { content } = render(RULES, target("adblock"), CONTEXT);

        expect(content).toBe([
            "[Adblock Plus 2.0]",
            "! Test rules",
            "! Rules: 1",
            "! Sources: A, B",
            "",
            "||tracker.example.com^",
            "",
        ].join("\n"));
    });

    // Scenario: A dialect that can express none of the rules
    it("should end with a single newline when every rule is omitted", () => {
        const suffixOnly = [rule("tracker.example.com", "SUFFIX")];
        const exactOnly = [rule("ads.example.com", "EXACT")];

        expect(render(suffixOnly, target("hosts"), CONTEXT)).toEqual({
            content: "# Test rules\n# Rules: 0\n# Sources: A, B\n",
            written: 0,
            omitted: 1,
        });
        expect(render(exactOnly, target("adblock"), CONTEXT).content)
            .toBe("[Adblock Plus 2.0]\n! Test rules\n! Rules: 0\n! Sources: A, B\n");
    });

    // Scenario: Rendered text normalizes back to the rules it was made from
    it.each(ROUND_TRIPS)("should round-trip %s through the %s normalizer", (dialect, format) => {
        const { content } = render(RULES, target(dialect), CONTEXT);
        const result = new Normalizer().normalize(content, format);
        const expressible = RULES.filter((entry) =>
            dialect === "hosts" ? entry.matchKind === "EXACT"
                : dialect === "adblock" ? entry.matchKind === "SUFFIX"
                    : dialect === "domains" ? entry.matchKind !== "KEYWORD"
                        : true
        );

        expect(result.rules.map(ruleKey)).toEqual(expressible.map(ruleKey));
        expect(result.stats.malformed).toBe(0);
    });
});

describe("emit", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "ruleboard-emit-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    // Scenario: A target is written in full, with parent directories created
    it("should write the rendered file and report counts", async () => {
        const destination = join(dir, "nested", "adblock.list");
        const result = await emit(RULES, { dialect: "loon-list", destination }, CONTEXT);
        const content = await readFile(destination, "utf-8");

        expect(content).toBe(render(RULES, { dialect: "loon-list", destination }, CONTEXT).content);
        expect(result).toEqual({
            dialect    : "loon-list",
            destination,
            success    : true,
            written    : 3,
            omitted    : 0,
            bytes      : Buffer.byteLength(content),
        });
        expect(await readdir(join(dir, "nested"))).toEqual(["adblock.list"]);
    });

    // Scenario: Emitting twice over identical rules gives identical bytes
    it("should be idempotent", async () => {
        const destination = join(dir, "rules.list");

        await emit(RULES, { dialect: "loon-rules", destination }, CONTEXT);
        const first = await readFile(destination, "utf-8");
        await emit(RULES, { dialect: "loon-rules", destination }, CONTEXT);

        expect(await readFile(destination, "utf-8")).toBe(first);
    });

    // Scenario: A render failure leaves the previous file untouched
    it("should keep the previous file when rendering fails", async () => {
        const destination = join(dir, "loon.conf");
        await writeFile(destination, "previous\n");

        await expect(emit(RULES, { dialect: "loon-config", destination }, CONTEXT)).rejects.toBeInstanceOf(WriteError);
        expect(await readFile(destination, "utf-8")).toBe("previous\n");
    });
});

describe("writeFileAtomic", () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), "ruleboard-atomic-"));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    // Scenario: Replacing an existing file
    it("should replace the destination and return the byte count", async () => {
        const destination = join(dir, "out.txt");
        await writeFile(destination, "old");

        const bytes = await writeFileAtomic(destination, "néw\n");

        expect(bytes).toBe(5);
        expect(await readFile(destination, "utf-8")).toBe("néw\n");
    });

    // Scenario: A failed rename removes the temporary file
    it("should clean up and throw WriteError when the rename fails", async () => {
        const destination = join(dir, "occupied");
        await mkdir(destination);
        await writeFile(join(destination, "keep.txt"), "x");

        await expect(writeFileAtomic(destination, "content")).rejects.toBeInstanceOf(WriteError);
        expect(await readdir(dir)).toEqual(["occupied"]);
    });
});
