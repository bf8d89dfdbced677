/**
 * @fileoverview Unit tests for the configuration loader
 *
 * Tests cover:
 * - parseConfig defaults and full configurations
 * - Validation messages for sources, targets, exclusions and settings
 * - loadConfig file handling
 * - buildTargets path resolution and template reading
 *
 * @module config/__tests__/loadConfig
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { ConfigError } from "@ruleboard/engine";
import { buildTargets, loadConfig, parseConfig } from "../config/loadConfig.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

const CONFIG_DIR = "/srv/ruleboard/config";
const BUNDLED_CONFIG_DIR = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "config");

const MINIMAL = `
sources:
  - name: hosts
    url: https://lists.test/hosts.txt
`;

describe("loadConfig", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    afterEach(() => {
        vi.clearAllMocks();
    });

    describe("parseConfig", () => {
        // Scenario: Only sources given; every other setting defaults
        it("should fill defaults for a minimal file", () => {
            const config = parseConfig(MINIMAL, CONFIG_DIR);

            expect(config).toEqual({
                sources: [{ name: "hosts", urls: ["https://lists.test/hosts.txt"] }],
                exclude: [],
                targets: [],
                output : { title: "Aggregated ad blocking rules", tag: "AdBlock" },
                report : { json: "report.json", page: "index.html", template: null },
                fetch  : {
                    timeoutMs   : 30000,
                    retries     : 1,
                    retryDelayMs: 1000,
                    concurrency : 4,
                    userAgent   : "ruleboard/0.1",
                },
                normalize: { hostsRedirects: "drop", misdetectionThreshold: 0.5 },
            });
        });

        // Scenario: Every section present
        it("should parse a full configuration", () => {
            const config = parseConfig(`
sources:
  - name: Advertising
    urls:
      - https://lists.test/a.list
      - https://lists.test/b.list
    format: loon
  - name: anti-AD
    url: https://lists.test/anti-ad.txt
    skip: true
exclude:
  - " Example.COM "
targets:
  - dialect: loon-list
    path: adblock_merged.list
  - dialect: loon-config
    path: loon_adblock.conf
    template: ../templates/loon-config.conf
output:
  title: My rules
  tag: Ads
report:
  json: false
  page: status.html
  template: /etc/ruleboard/status.html
fetch:
  timeoutMs: 5000
  retries: 0
  retryDelayMs: 0
  concurrency: 2
  userAgent: test-agent
normalize:
  hostsRedirects: include
  misdetectionThreshold: 0.8
`, CONFIG_DIR);

            expect(config.sources).toEqual([
                {
                    name  : "Advertising",
                    urls  : ["https://lists.test/a.list", "https://lists.test/b.list"],
                    format: "SURGE_LOON",
                },
                { name: "anti-AD", urls: ["https://lists.test/anti-ad.txt"], skip: true },
            ]);
            expect(config.exclude).toEqual(["example.com"]);
            expect(config.targets).toEqual([
                { dialect: "loon-list", path: "adblock_merged.list" },
                {
                    dialect : "loon-config",
                    path    : "loon_adblock.conf",
                    template: "/srv/ruleboard/templates/loon-config.conf",
                },
            ]);
            expect(config.output).toEqual({ title: "My rules", tag: "Ads" });
            expect(config.report).toEqual({ json: null, page: "status.html", template: "/etc/ruleboard/status.html" });
            expect(config.fetch).toEqual({
                timeoutMs   : 5000,
                retries     : 0,
                retryDelayMs: 0,
                concurrency : 2,
                userAgent   : "test-agent",
            });
            expect(config.normalize).toEqual({ hostsRedirects: "include", misdetectionThreshold: 0.8 });
        });

        // Scenario: Broken YAML
        it("should throw ConfigError for invalid YAML", () => {
            expect(() => parseConfig("sources: [\n", CONFIG_DIR)).toThrow(ConfigError);
            expect(() => parseConfig("sources: [\n", CONFIG_DIR)).toThrow(/^Invalid YAML: /);
        });

        // Scenario: Missing sources list
        it("should throw when sources is missing", () => {
            expect(() => parseConfig("targets: []\n", CONFIG_DIR))
                .toThrow("Invalid config file format: expected { sources: [...] }");
        });

        // Scenario: Each malformed source names its index
        it.each([
            ["- url: https://lists.test/a.txt", "Invalid source at index 0: missing or invalid 'name'"],
            ["- name: a", "Invalid source at index 0: missing 'url' or 'urls'"],
            [
                "- name: a\n    url: https://lists.test/a.txt\n    urls: [https://lists.test/b.txt]",
                "Invalid source at index 0: use either 'url' or 'urls', not both",
            ],
            ["- name: a\n    urls: []", "Invalid source at index 0: 'urls' must be a non-empty list"],
            [
                "- name: a\n    url: https://lists.test/a.txt\n    format: clash",
                "Invalid source at index 0: unknown format 'clash' (expected hosts, surge-loon, adblock or plain)",
            ],
            [
                "- name: a\n    url: https://lists.test/a.txt\n    skip: yes please",
                "Invalid source at index 0: 'skip' must be true or false",
            ],
        ])("should reject source %j", (entry, message) => {
            expect(() => parseConfig(`sources:\n  ${entry}\n`, CONFIG_DIR)).toThrow(message);
        });

        // Scenario: Source names identify report rows and must be unique
        it("should reject duplicate source names", () => {
            const content = `${MINIMAL}  - name: hosts\n    url: https://lists.test/other.txt\n`;

            expect(() => parseConfig(content, CONFIG_DIR)).toThrow("Duplicate source name 'hosts'");
        });

        // Scenario: Exclusions must be domains
        it("should reject exclude entries that are not domains", () => {
            const content = `${MINIMAL}exclude:\n  - apple.com\n  - "not a domain"\n`;

            expect(() => parseConfig(content, CONFIG_DIR))
                .toThrow("Invalid exclude entry at index 1: 'not a domain' is not a domain");
        });

        // Scenario: Target validation
        it("should validate targets", () => {
            expect(() => parseConfig(`${MINIMAL}targets:\n  - dialect: quantumult\n    path: a.list\n`, CONFIG_DIR))
                .toThrow("Invalid target at index 0: unknown dialect 'quantumult'");
            expect(() => parseConfig(`${MINIMAL}targets:\n  - dialect: hosts\n`, CONFIG_DIR))
                .toThrow("Invalid target at index 0: missing or invalid 'path'");
            expect(() => parseConfig(`${MINIMAL}targets:\n  - dialect: loon-config\n    path: a.conf\n`, CONFIG_DIR))
                .toThrow("Invalid target at index 0: dialect 'loon-config' requires a 'template'");
        });

        // Scenario: Numeric settings are range-checked
        it("should reject out-of-range settings", () => {
            expect(() => parseConfig(`${MINIMAL}fetch:\n  concurrency: 0\n`, CONFIG_DIR))
                .toThrow("Invalid 'fetch' section: 'concurrency' must be a positive integer");
            expect(() => parseConfig(`${MINIMAL}normalize:\n  misdetectionThreshold: 2\n`, CONFIG_DIR))
                .toThrow("Invalid 'normalize' section: 'misdetectionThreshold' must be between 0 and 1");
            expect(() => parseConfig(`${MINIMAL}normalize:\n  hostsRedirects: keep\n`, CONFIG_DIR))
                .toThrow("Invalid 'normalize' section: 'hostsRedirects' must be drop or include");
        });
    });

    describe("loadConfig", () => {
        // Scenario: Missing config file
        it("should throw when the file does not exist", () => {
            mockExistsSync.mockReturnValue(false);

            expect(() => loadConfig("/missing/ruleboard.yml")).toThrow("Config file not found: /missing/ruleboard.yml");
            expect(mockReadFileSync).not.toHaveBeenCalled();
        });

        // Scenario: Template paths resolve against the config file's directory
        it("should read the file and resolve relative templates", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue(`${MINIMAL}report:\n  template: status.html\n`);

            const config = loadConfig("/srv/ruleboard/config/ruleboard.yml");

            expect(mockReadFileSync).toHaveBeenCalledWith("/srv/ruleboard/config/ruleboard.yml", "utf-8");
            expect(config.report.template).toBe("/srv/ruleboard/config/status.html");
        });
    });

    describe("bundled config", () => {
        // Scenario: The shipped ruleboard.yml parses and keeps the default exclusions
        it("should exclude the default service domains", async () => {
            const fs = await vi.importActual<typeof import("fs")>("fs");
            const content = fs.readFileSync(join(BUNDLED_CONFIG_DIR, "ruleboard.yml"), "utf-8");

            const config = parseConfig(content, BUNDLED_CONFIG_DIR);

            expect(config.exclude).toEqual([
                "netflix.com",
                "disneyplus.com",
                "twitter.com",
                "t.co",
                "facebook.com",
                "fbcdn.net",
                "paypal.com",
                "paypalobjects.com",
                "discord.com",
                "discordapp.com",
                "weibo.com",
                "weibo.cn",
            ]);
        });
    });

    describe("buildTargets", () => {
        // Scenario: Relative paths land in the output directory
        it("should resolve destinations against the output directory", () => {
            const targets = buildTargets([
                { dialect: "loon-list", path: "adblock_merged.list" },
                { dialect: "clash-provider", path: "clash/adblock.yaml" },
                { dialect: "hosts", path: "/var/www/hosts.txt" },
            ], "/srv/public");

            expect(targets).toEqual([
                { dialect: "loon-list", destination: "/srv/public/adblock_merged.list" },
                { dialect: "clash-provider", destination: "/srv/public/clash/adblock.yaml" },
                { dialect: "hosts", destination: "/var/www/hosts.txt" },
            ]);
        });

        // Scenario: Templates are read into the target
        it("should read template files", () => {
            mockExistsSync.mockReturnValue(true);
            mockReadFileSync.mockReturnValue("[Rule]\n{{RULES}}\n");

            const [target] = buildTargets(
                [{ dialect: "loon-config", path: "loon.conf", template: "/srv/templates/loon.conf" }],
                "/srv/public"
            );

            expect(target).toEqual({
                dialect    : "loon-config",
                destination: "/srv/public/loon.conf",
                template   : "[Rule]\n{{RULES}}\n",
            });
        });

        // Scenario: A configured template that does not exist
        it("should throw when a template is missing", () => {
            mockExistsSync.mockReturnValue(false);

            expect(() => buildTargets(
                [{ dialect: "loon-config", path: "loon.conf", template: "/srv/templates/gone.conf" }],
                "/srv/public"
            )).toThrow("Template not found: /srv/templates/gone.conf");
        });
    });
});
