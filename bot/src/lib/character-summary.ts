/**
 * Character summary lookup: level, class and the names of the worn items,
 * read from the same FlashVars block the renderer uses.
 */

import type { CharacterPageSource } from '../services/charpage/http.js';
import { parseFlashVars, type RawCharacterParameters } from '../services/charpage/flashvars.js';
import { fail, succeed, type Outcome } from '../services/result.js';

export const MISSING_VALUE = 'N/A';

export interface CharacterSummary {
    name: string;
    level: number;
    className: string;
    faction: string;
    guild: string;
    helm: string;
    armor: string;
    cape: string;
    weapon: string;
    pet: string;
}

export type CharacterSummaryResult = Outcome<
    CharacterSummary,
    'NotFound' | 'NetworkError' | 'UpstreamError' | 'MalformedPage' | 'Cancelled'
>;

export interface CharacterSummaryDeps {
    pages: CharacterPageSource;
    allowUnknownKeys?: boolean;
}

function orMissing(value: string): string {
    return value.trim() || MISSING_VALUE;
}

export function summarizeCharacter(params: RawCharacterParameters): CharacterSummary {
    return {
        name: params.strName,
        level: params.intLevel,
        className: orMissing(params.strClassName),
        faction: orMissing(params.strFaction),
        guild: orMissing(params.strGuild),
        helm: orMissing(params.strHelmName),
        armor: orMissing(params.strArmorName),
        cape: orMissing(params.strCapeName),
        weapon: orMissing(params.strWeaponName),
        pet: orMissing(params.strPetName),
    };
}

export async function lookupCharacter(
    deps: CharacterSummaryDeps,
    username: string,
    signal?: AbortSignal
): Promise<CharacterSummaryResult> {
    if (username.trim().length === 0) {
        return fail('NotFound', 'No character name was given.');
    }

    const page = await deps.pages.fetchPage(username, signal);
    if (!page.ok) return page;

    const params = parseFlashVars(page.value.html, { allowUnknownKeys: deps.allowUnknownKeys });
    if (!params.ok) return params;

    return succeed(summarizeCharacter(params.value));
}
