/**
 * Equipment Model Builder
 *
 * Shapes parsed FlashVars into the request the render service understands.
 * Pure data shaping: visibility flags are decoded and sent along, but hidden
 * slots keep their equipment data. Hiding is the renderer's job.
 */

import type { RawCharacterParameters } from './flashvars.js';
import { createLogger } from '../../lib/logging/logger.js';

const logger = createLogger('EquipmentModel');

export const DEFAULT_ASSET_BASE_URL = 'https://game.aq.com/game/gamefiles/';

/** Path of the character viewer movie, relative to the asset base URL */
export const CHARACTER_VIEWER_PATH = 'etc/chardetail/characterB.swf?v=2';

export const EMPTY_FILE = 'none';

export const MAX_COLOR = 0xffffff;

export type ViewMode = 'equipped' | 'cosmetic';

export const VIEW_MODES: readonly ViewMode[] = ['equipped', 'cosmetic'];

export type Gender = 'M' | 'F';

export interface EquipmentSlot {
    File: string;
    Link: string;
}

export interface WeaponSlot extends EquipmentSlot {
    Type: string;
}

/**
 * Slot keys as the render service names them.
 */
export interface EquipmentMap {
    en: EquipmentSlot;      // entity
    co: EquipmentSlot;      // class / armor
    he: EquipmentSlot;      // helm
    Weapon: WeaponSlot;
    ba: EquipmentSlot;      // cape
    pe: EquipmentSlot;      // pet
    mi: EquipmentSlot;      // misc
}

export interface HairSlot {
    File: string;
    Name: string;
}

export interface VisibilityFlags {
    hideCape: boolean;
    hideHelm: boolean;
    hidePet: boolean;
}

export type ColorField =
    | 'intColorSkin'
    | 'intColorHair'
    | 'intColorEye'
    | 'intColorBase'
    | 'intColorTrim'
    | 'intColorAccessory';

export type AppearanceColors = Record<ColorField, number>;

export interface RenderRequest extends AppearanceColors {
    url: string;
    swf: string;
    gender: Gender;
    ia1: number;
    visibility: VisibilityFlags;
    equipment: EquipmentMap;
    hair: HairSlot;
}

export interface ColorClampWarning {
    field: ColorField;
    value: number;
    clampedTo: number;
}

export interface BuildRenderRequestOptions {
    assetBaseUrl?: string;
}

export interface BuiltRenderRequest {
    request: RenderRequest;
    warnings: ColorClampWarning[];
}

/**
 * Decode the achievement bitmask: bit 0 hides the cape, bit 1 the helm,
 * bit 2 the pet. Higher bits are ignored.
 */
export function decodeVisibility(ia1: number): VisibilityFlags {
    return {
        hideCape: (ia1 & 0b001) !== 0,
        hideHelm: (ia1 & 0b010) !== 0,
        hidePet: (ia1 & 0b100) !== 0,
    };
}

function isEmptyFile(file: string): boolean {
    const trimmed = file.trim();
    return trimmed === '' || trimmed.toLowerCase() === EMPTY_FILE;
}

/**
 * A slot whose file is empty or "none" renders nothing, so its link is dropped.
 */
export function normalizeSlot(file: string, link: string): EquipmentSlot {
    if (isEmptyFile(file)) {
        return { File: EMPTY_FILE, Link: '' };
    }
    return { File: file.trim(), Link: link.trim() };
}

export function clampColor(value: number): number {
    if (!Number.isFinite(value) || value < 0) return 0;
    if (value > MAX_COLOR) return MAX_COLOR;
    return Math.trunc(value);
}

/**
 * Class slot source for a view. Cosmetic view shows the armor, falling back
 * to the class when no armor file is set.
 */
function classSlot(params: RawCharacterParameters, view: ViewMode): EquipmentSlot {
    if (view === 'cosmetic' && !isEmptyFile(params.strArmorFile)) {
        return normalizeSlot(params.strArmorFile, params.strArmorLink);
    }
    return normalizeSlot(params.strClassFile, params.strClassLink);
}

function ensureTrailingSlash(url: string): string {
    return url.endsWith('/') ? url : `${url}/`;
}

/**
 * Build the render request for a character. Same parameters and view always
 * produce the same request, key order included.
 */
export function buildRenderRequest(
    params: RawCharacterParameters,
    view: ViewMode,
    options: BuildRenderRequestOptions = {}
): BuiltRenderRequest {
    const url = ensureTrailingSlash(options.assetBaseUrl ?? DEFAULT_ASSET_BASE_URL);
    const gender = params.strGender;

    const equipment: EquipmentMap = {
        en: normalizeSlot(params.strEntityFile, params.strEntityLink),
        co: classSlot(params, view),
        he: normalizeSlot(params.strHelmFile, params.strHelmLink),
        Weapon: {
            ...normalizeSlot(params.strWeaponFile, params.strWeaponLink),
            Type: params.strWeaponType.trim(),
        },
        ba: normalizeSlot(params.strCapeFile, params.strCapeLink),
        pe: normalizeSlot(params.strPetFile, params.strPetLink),
        mi: normalizeSlot(params.strMiscFile, params.strMiscLink),
    };

    const hair: HairSlot = isEmptyFile(params.strHairFile)
        ? { File: `hair/${gender}/Normal.swf`, Name: 'Default' }
        : { File: params.strHairFile.trim(), Name: params.strHairName.trim() || 'Default' };

    const warnings: ColorClampWarning[] = [];
    const color = (field: ColorField): number => {
        const value = params[field];
        const clamped = clampColor(value);
        if (clamped !== value) {
            warnings.push({ field, value, clampedTo: clamped });
            logger.warn('Color out of range, clamped', { username: params.strName, field, value, clampedTo: clamped });
        }
        return clamped;
    };

    const colors: AppearanceColors = {
        intColorSkin: color('intColorSkin'),
        intColorHair: color('intColorHair'),
        intColorEye: color('intColorEye'),
        intColorBase: color('intColorBase'),
        intColorTrim: color('intColorTrim'),
        intColorAccessory: color('intColorAccessory'),
    };

    const request: RenderRequest = {
        url,
        swf: `${url}${CHARACTER_VIEWER_PATH}`,
        gender,
        ia1: params.ia1,
        visibility: decodeVisibility(params.ia1),
        equipment,
        hair,
        ...colors,
    };

    return { request, warnings };
}
