/**
 * Test fixtures for character pages and rendered images.
 */

import sharp from 'sharp';
import { FlashVarsSchema, type RawCharacterParameters } from '../../src/services/charpage/flashvars.js';

/**
 * FlashVars of a made-up character, as the upstream page would carry them.
 */
export const SAMPLE_FLASHVARS: Readonly<Record<string, string>> = {
    strName: 'Yenne',
    intLevel: '100',
    strClassName: 'Void Highlord',
    strFaction: 'Good',
    strGuild: 'Test Guild',
    strGender: 'F',
    strHairFile: 'hair/F/Bangs.swf',
    strHairName: 'Bangs',
    intColorSkin: '15388042',
    intColorHair: '6697728',
    intColorEye: '91294',
    intColorBase: '0',
    intColorTrim: '16777215',
    intColorAccessory: '3355443',
    ia1: '0',
    strEntityFile: 'none',
    strEntityLink: '',
    strClassFile: 'items/classes/VoidHighlord.swf',
    strClassLink: 'VoidHighlord',
    strArmorName: 'Shadow Knight',
    strArmorFile: 'items/armors/ShadowKnight.swf',
    strArmorLink: 'ShadowKnight',
    strHelmFile: 'items/helms/Hood.swf',
    strHelmLink: 'Hood',
    strWeaponFile: 'items/swords/Blade.swf',
    strWeaponLink: 'Blade',
    strWeaponType: 'Sword',
    strCapeFile: 'items/capes/Wings.swf',
    strCapeLink: 'Wings',
    strPetFile: 'items/pets/Moglin.swf',
    strPetLink: 'Moglin',
    strMiscFile: 'none',
    strMiscLink: '',
};

export function flashVarsString(vars: Readonly<Record<string, string>>): string {
    return new URLSearchParams({ ...vars }).toString();
}

/**
 * Character page markup with the FlashVars in both `<param>` and `<embed>`,
 * HTML-escaped the way the upstream page serves them.
 */
export function charPageHtml(vars: Readonly<Record<string, string>> = SAMPLE_FLASHVARS): string {
    const encoded = flashVarsString(vars).replace(/&/g, '&amp;');
    return [
        '<!DOCTYPE html>',
        '<html><head><title>Character Page</title></head><body>',
        '<div id="viewer">',
        '<object type="application/x-shockwave-flash" data="characterB.swf">',
        `<param name="FlashVars" value="${encoded}">`,
        `<embed src="characterB.swf" flashvars="${encoded}">`,
        '</object>',
        '</div>',
        '</body></html>',
    ].join('\n');
}

export const MISSING_CHARACTER_HTML =
    '<!DOCTYPE html><html><body><div class="card"><p>Yenne is wandering in the Void.</p></div></body></html>';

export function sampleParams(overrides: Record<string, string> = {}): RawCharacterParameters {
    return FlashVarsSchema.parse({ ...SAMPLE_FLASHVARS, ...overrides });
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/** Bytes with a PNG signature; enough for the protocol's format check */
export const TEST_PNG = Buffer.concat([PNG_SIGNATURE, Buffer.from('test-image-data', 'ascii')]);

/** Bytes with a GIF signature */
export const TEST_GIF = Buffer.concat([Buffer.from('GIF89a', 'ascii'), Buffer.from('test-gif-data', 'ascii')]);

/**
 * A decodable 4x4 PNG with a transparent half, for tests that convert formats.
 */
export async function decodablePng(): Promise<Buffer> {
    return sharp({
        create: { width: 4, height: 4, channels: 4, background: { r: 200, g: 40, b: 40, alpha: 1 } },
    })
        .composite([{
            input: { create: { width: 2, height: 4, channels: 4, background: { r: 0, g: 0, b: 0, alpha: 0 } } },
            left: 0,
            top: 0,
        }])
        .png()
        .toBuffer();
}

/**
 * A fetch stand-in that answers every request with the given body and status.
 */
export function staticFetch(body: string, status = 200) {
    return async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
        new Response(body, { status, headers: { 'content-type': 'text/html' } });
}
