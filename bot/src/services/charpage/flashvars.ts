/**
 * FlashVars extraction for the character page.
 *
 * The page embeds the character viewer with a flat, URL-encoded key=value list
 * (the FlashVars) describing gender, equipment, hair, colors and achievement
 * flags. The set of keys is owned by the upstream site and changes without
 * notice, so the decoded map is checked against a closed schema: an unknown
 * key, a non-numeric number field or a bad gender is a MalformedPage, never a
 * silently dropped value.
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import { fail, succeed, type Outcome } from '../result.js';

const text = z.string().default('');

const int = z
    .string()
    .trim()
    .regex(/^(-?\d+)?$/, 'expected a decimal integer')
    .default('')
    .transform(v => (v === '' ? 0 : Number.parseInt(v, 10)));

/**
 * Schema version of the known FlashVars keys. Bump when keys are added or removed.
 */
export const FLASHVARS_SCHEMA_VERSION = 1;

export const FlashVarsSchema = z.object({
    // Identity
    strName: z.string().trim().min(1, 'character name is missing'),
    intLevel: int,
    strClassName: text,
    strFaction: text,
    strGuild: text,
    strGender: z.string().trim().toUpperCase().pipe(z.enum(['M', 'F'])),

    // Appearance
    strHairFile: text,
    strHairName: text,
    intColorSkin: int,
    intColorHair: int,
    intColorEye: int,
    intColorBase: int,
    intColorTrim: int,
    intColorAccessory: int,
    ia1: int,

    // Equipped items
    strEntityFile: text,
    strEntityLink: text,
    strClassFile: text,
    strClassLink: text,
    strArmorName: text,
    strArmorFile: text,
    strArmorLink: text,
    strHelmName: text,
    strHelmFile: text,
    strHelmLink: text,
    strWeaponName: text,
    strWeaponFile: text,
    strWeaponLink: text,
    strWeaponType: text,
    strCapeName: text,
    strCapeFile: text,
    strCapeLink: text,
    strPetName: text,
    strPetFile: text,
    strPetLink: text,
    strMiscName: text,
    strMiscFile: text,
    strMiscLink: text,

    // Cosmetic overrides
    strCustArmorName: text,
    strCustArmorFile: text,
    strCustArmorLink: text,
    strCustHelmName: text,
    strCustHelmFile: text,
    strCustHelmLink: text,
    strCustWeaponName: text,
    strCustWeaponFile: text,
    strCustWeaponLink: text,
    strCustCapeName: text,
    strCustCapeFile: text,
    strCustCapeLink: text,
    strCustPetName: text,
    strCustPetFile: text,
    strCustPetLink: text,
});

export type RawCharacterParameters = Readonly<z.output<typeof FlashVarsSchema>>;

export type ParseFlashVarsResult = Outcome<RawCharacterParameters, 'MalformedPage'>;

export interface ParseFlashVarsOptions {
    /** Drop keys the schema does not know instead of failing */
    allowUnknownKeys?: boolean;
}

/**
 * Find the raw (still URL-encoded) FlashVars string in page markup.
 * Looks at `<embed flashvars>`, `<object flashvars>` and
 * `<param name="FlashVars" value>` in that order, then at script text.
 */
export function extractFlashVarsBlock(html: string): string | null {
    const $ = cheerio.load(html);

    const fromAttribute = $('embed[flashvars], object[flashvars]').first().attr('flashvars');
    if (fromAttribute && fromAttribute.trim()) {
        return fromAttribute.trim();
    }

    const param = $('param')
        .filter((_, el) => ($(el).attr('name') ?? '').toLowerCase() === 'flashvars')
        .first()
        .attr('value');
    if (param && param.trim()) {
        return param.trim();
    }

    // Viewer embedded from script: flashvars = "..."
    const scriptMatch = /flashvars\s*[:=]\s*["']([^"']+)["']/i.exec($('script').text());
    if (scriptMatch?.[1]) {
        return scriptMatch[1].replace(/&amp;/g, '&').trim();
    }

    return null;
}

/**
 * Decode a FlashVars string into a plain map. Values are URL-decoded
 * (`+` is a space); a repeated key keeps its last value.
 */
export function decodeFlashVars(block: string): Map<string, string> {
    const values = new Map<string, string>();
    for (const [key, value] of new URLSearchParams(block)) {
        if (key.length > 0) {
            values.set(key, value);
        }
    }
    return values;
}

/**
 * Parse a character page into its FlashVars parameters.
 */
export function parseFlashVars(html: string, options: ParseFlashVarsOptions = {}): ParseFlashVarsResult {
    const block = extractFlashVarsBlock(html);
    if (block === null) {
        return fail('MalformedPage', 'Could not find FlashVars on the character page. The page structure may have changed.');
    }

    const values = decodeFlashVars(block);
    if (values.size === 0) {
        return fail('MalformedPage', 'FlashVars block on the character page is empty.');
    }

    const schema = options.allowUnknownKeys ? FlashVarsSchema.strip() : FlashVarsSchema.strict();
    const parsed = schema.safeParse(Object.fromEntries(values));

    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => {
            if (issue.code === 'unrecognized_keys') {
                return `unknown keys: ${issue.keys.join(', ')}`;
            }
            return `${issue.path.join('.')}: ${issue.message}`;
        });
        return fail('MalformedPage', `FlashVars did not match schema v${FLASHVARS_SCHEMA_VERSION} (${issues.join('; ')})`);
    }

    return succeed(Object.freeze(parsed.data));
}
