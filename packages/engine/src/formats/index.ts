/**
 * @fileoverview Format handler registry
 *
 * One handler per known format. Typed as a Record over KnownFormat so a
 * new format does not compile until its handler is registered here.
 *
 * @module @ruleboard/engine/formats
 */

import type { FormatHandler, KnownFormat } from "../contracts/Format.js";
import { adblockHandler } from "./adblock.js";
import { hostsHandler } from "./hosts.js";
import { plainHandler } from "./plain.js";
import { surgeLoonHandler } from "./surgeLoon.js";

export const FORMAT_HANDLERS: Readonly<Record<KnownFormat, FormatHandler>> = {
    HOSTS     : hostsHandler,
    SURGE_LOON: surgeLoonHandler,
    ADBLOCK   : adblockHandler,
    PLAIN     : plainHandler,
};

export { adblockHandler } from "./adblock.js";
export { hostsHandler, isBlockMarker, isIpToken } from "./hosts.js";
export { plainHandler } from "./plain.js";
export { surgeLoonHandler, DOMAIN_RULE_TYPES } from "./surgeLoon.js";
export { candidateLines, splitLines, stripInlineComment } from "./lines.js";
