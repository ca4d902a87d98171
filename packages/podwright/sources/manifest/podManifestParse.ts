import type { PodManifest, PodRequirement } from "../types.js";

export interface PodManifestParseOptions {
    requirePinned: boolean;
}

const REQUIREMENT_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(\[[A-Za-z0-9._,\s-]*\])?\s*(.*)$/;
const SPECIFIER_PATTERN = /^(===|==|~=|!=|<=|>=|<|>)\s*[A-Za-z0-9.*+!_-]+$/;
const PIN_PATTERN = /^==\s*([A-Za-z0-9.+!_-]+)$/;
const URL_PATTERN = /^[A-Za-z][A-Za-z0-9+.-]*:\/\/\S+$/;
const PATH_PATTERN = /^(\.{1,2}(\/\S*)?|\/\S*|~\S*)$/;
const ARCHIVE_PATTERN = /^\S+\.(whl|zip|tar\.gz|tgz|tar\.bz2)$/;
const EGG_PATTERN = /[#&]egg=([A-Za-z0-9._-]+)/;

interface PodManifestLine {
    line: number;
    content: string;
}

/**
 * Parses a pip requirements manifest into requirement entries.
 * Expects: text is the full manifest; every malformed line is reported with its number.
 */
export function podManifestParse(path: string, text: string, options: PodManifestParseOptions): PodManifest {
    const requirements: PodRequirement[] = [];
    const pipOptions: string[] = [];
    const problems: string[] = [];

    for (const { line, content } of podManifestLinesJoin(text)) {
        if (content.startsWith("-")) {
            pipOptions.push(content);
            continue;
        }

        const requirement = podRequirementParse(content, line);
        if (typeof requirement === "string") {
            problems.push(`line ${line}: ${requirement}`);
            continue;
        }
        // URL, VCS and path requirements are fixed by their location.
        if (options.requirePinned && requirement.location === undefined && requirement.pinnedVersion === undefined) {
            problems.push(`line ${line}: ${requirement.name} is not pinned with ==`);
            continue;
        }
        requirements.push(requirement);
    }

    if (problems.length > 0) {
        throw new Error(`Malformed dependency manifest at ${path}:\n${problems.join("\n")}`);
    }

    return { path, requirements, options: pipOptions };
}

/**
 * Strips comments and joins backslash continuations into logical lines numbered by their first physical line.
 */
function podManifestLinesJoin(text: string): PodManifestLine[] {
    const result: PodManifestLine[] = [];
    const physical = text.split(/\r?\n/);
    let pending: PodManifestLine | null = null;

    for (let index = 0; index < physical.length; index += 1) {
        const stripped = podManifestCommentStrip(physical[index] ?? "").trim();
        const continued = stripped.endsWith("\\");
        const piece = continued ? stripped.slice(0, -1).trim() : stripped;

        const current: PodManifestLine = pending
            ? { line: pending.line, content: `${pending.content} ${piece}`.trim() }
            : { line: index + 1, content: piece };

        if (continued) {
            pending = current;
            continue;
        }
        pending = null;
        if (current.content.length > 0) {
            result.push(current);
        }
    }
    if (pending && pending.content.length > 0) {
        result.push(pending);
    }

    return result;
}

function podManifestCommentStrip(line: string): string {
    const match = /(^|\s)#/.exec(line);
    return match ? line.slice(0, match.index) : line;
}

function podRequirementParse(content: string, line: number): PodRequirement | string {
    const optionStart = content.search(/\s--/);
    const body = (optionStart >= 0 ? content.slice(0, optionStart) : content).trim();
    const requirementOptions = optionStart >= 0 ? content.slice(optionStart).trim().split(/\s+(?=--)/) : [];
    const extra = requirementOptions.length > 0 ? { options: requirementOptions } : {};

    const locationPart = body.split(/\s+;/)[0]?.trim() ?? "";
    if (URL_PATTERN.test(locationPart) || PATH_PATTERN.test(locationPart) || ARCHIVE_PATTERN.test(locationPart)) {
        const egg = EGG_PATTERN.exec(locationPart)?.[1];
        return { line, name: egg ?? locationPart, raw: body, location: locationPart, ...extra };
    }

    const match = REQUIREMENT_PATTERN.exec(body);
    const name = match?.[1];
    if (!match || !name) {
        return `invalid requirement "${body}"`;
    }

    const rest = (match[3] ?? "").trim();
    const marker = rest.indexOf(";");
    const specifiers = (marker >= 0 ? rest.slice(0, marker) : rest).trim();

    if (specifiers.startsWith("@")) {
        const location = specifiers.slice(1).trim();
        if (location.length === 0) {
            return `missing direct reference for ${name}`;
        }
        return { line, name, raw: body, location, ...extra };
    }
    if (specifiers.length === 0) {
        return { line, name, raw: body, ...extra };
    }

    const parts = specifiers.split(",").map((part) => part.trim());
    if (parts.some((part) => !SPECIFIER_PATTERN.test(part))) {
        return `invalid version specifier "${specifiers}" for ${name}`;
    }

    const pin = parts.length === 1 ? PIN_PATTERN.exec(parts[0] ?? "") : null;
    return { line, name, raw: body, pinnedVersion: pin?.[1], ...extra };
}
