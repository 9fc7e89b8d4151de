// bot/src/lib/verification.ts
/**
 * Character ownership verification
 * Compares the IGN and guild a member claims against the character page:
 * 1. Fetch the character page
 * 2. Parse its FlashVars
 * 3. Compare normalized name and guild
 */

import type { CharacterPageSource } from '../services/charpage/http.js';
import { parseFlashVars } from '../services/charpage/flashvars.js';
import { fail, succeed, type Outcome } from '../services/result.js';
import { createLogger } from './logging/logger.js';

const logger = createLogger('Verification');

// ===== TYPES =====

export interface VerificationClaim {
    ign: string;
    /** Empty when the member says they have no guild */
    guild: string;
}

export interface VerificationReport {
    claim: VerificationClaim;
    pageName: string;
    pageGuild: string;
    level: number;
    className: string;
    nameMatches: boolean;
    guildMatches: boolean;
    verified: boolean;
}

export type VerificationResult = Outcome<
    VerificationReport,
    'NotFound' | 'NetworkError' | 'UpstreamError' | 'MalformedPage' | 'Cancelled'
>;

export interface VerificationDeps {
    pages: CharacterPageSource;
    allowUnknownKeys?: boolean;
}

// ===== MATCHING =====

/**
 * Case-fold and collapse whitespace so "  Yenne  Two" matches "yenne two".
 */
export function normalizeName(value: string): string {
    return value.trim().split(/\s+/).filter(Boolean).join(' ').toLowerCase();
}

/**
 * Guild claims match when both sides are empty or both normalize equal.
 */
export function guildsMatch(claimed: string, onPage: string): boolean {
    return normalizeName(claimed) === normalizeName(onPage);
}

// ===== CHECKING =====

export async function verifyCharacter(
    deps: VerificationDeps,
    claim: VerificationClaim,
    signal?: AbortSignal
): Promise<VerificationResult> {
    const ign = claim.ign.trim();
    if (ign.length === 0) {
        return fail('NotFound', 'No character name was given.');
    }

    const page = await deps.pages.fetchPage(ign, signal);
    if (!page.ok) {
        return page;
    }

    const params = parseFlashVars(page.value.html, { allowUnknownKeys: deps.allowUnknownKeys });
    if (!params.ok) {
        return params;
    }

    const nameMatches = normalizeName(ign) === normalizeName(params.value.strName);
    const guildMatches = guildsMatch(claim.guild, params.value.strGuild);
    const verified = nameMatches && guildMatches;

    logger.info('Verification checked', { ign, nameMatches, guildMatches, verified });

    return succeed({
        claim: { ign, guild: claim.guild.trim() },
        pageName: params.value.strName,
        pageGuild: params.value.strGuild,
        level: params.value.intLevel,
        className: params.value.strClassName,
        nameMatches,
        guildMatches,
        verified,
    });
}
