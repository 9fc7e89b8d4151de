import { vi } from 'vitest';
import {
    buildRenderRequest,
    clampColor,
    decodeVisibility,
    normalizeSlot,
    DEFAULT_ASSET_BASE_URL,
    MAX_COLOR,
} from './equipment.js';
import { sampleParams } from '../../../test/helpers/fixtures.js';

describe('decodeVisibility', () => {
    it.each([
        [0, { hideCape: false, hideHelm: false, hidePet: false }],
        [1, { hideCape: true, hideHelm: false, hidePet: false }],
        [2, { hideCape: false, hideHelm: true, hidePet: false }],
        [3, { hideCape: true, hideHelm: true, hidePet: false }],
        [4, { hideCape: false, hideHelm: false, hidePet: true }],
        [5, { hideCape: true, hideHelm: false, hidePet: true }],
        [6, { hideCape: false, hideHelm: true, hidePet: true }],
        [7, { hideCape: true, hideHelm: true, hidePet: true }],
    ])('decodes ia1=%i', (ia1, expected) => {
        expect(decodeVisibility(ia1)).toEqual(expected);
    });

    it('ignores higher bits', () => {
        expect(decodeVisibility(8)).toEqual({ hideCape: false, hideHelm: false, hidePet: false });
        expect(decodeVisibility(0b1010)).toEqual({ hideCape: false, hideHelm: true, hidePet: false });
    });
});

describe('normalizeSlot', () => {
    it('turns empty and "none" files into an empty slot', () => {
        expect(normalizeSlot('', 'Orphan')).toEqual({ File: 'none', Link: '' });
        expect(normalizeSlot('None', 'Orphan')).toEqual({ File: 'none', Link: '' });
    });

    it('keeps a real file and its link', () => {
        expect(normalizeSlot(' items/capes/Wings.swf ', 'Wings')).toEqual({ File: 'items/capes/Wings.swf', Link: 'Wings' });
    });
});

describe('clampColor', () => {
    it('clamps into the 24-bit range', () => {
        expect(clampColor(-1)).toBe(0);
        expect(clampColor(MAX_COLOR + 1)).toBe(16777215);
        expect(clampColor(123456)).toBe(123456);
    });
});

describe('buildRenderRequest', () => {
    it('maps every slot for the equipped view', () => {
        const { request, warnings } = buildRenderRequest(sampleParams(), 'equipped');

        expect(warnings).toEqual([]);
        expect(request.url).toBe(DEFAULT_ASSET_BASE_URL);
        expect(request.swf).toBe('https://game.aq.com/game/gamefiles/etc/chardetail/characterB.swf?v=2');
        expect(request.gender).toBe('F');
        expect(request.ia1).toBe(0);
        expect(request.equipment).toEqual({
            en: { File: 'none', Link: '' },
            co: { File: 'items/classes/VoidHighlord.swf', Link: 'VoidHighlord' },
            he: { File: 'items/helms/Hood.swf', Link: 'Hood' },
            Weapon: { File: 'items/swords/Blade.swf', Link: 'Blade', Type: 'Sword' },
            ba: { File: 'items/capes/Wings.swf', Link: 'Wings' },
            pe: { File: 'items/pets/Moglin.swf', Link: 'Moglin' },
            mi: { File: 'none', Link: '' },
        });
        expect(request.hair).toEqual({ File: 'hair/F/Bangs.swf', Name: 'Bangs' });
        expect(request.intColorSkin).toBe(15388042);
        expect(request.intColorTrim).toBe(16777215);
    });

    it('uses the armor for the class slot in the cosmetic view', () => {
        const { request } = buildRenderRequest(sampleParams(), 'cosmetic');
        expect(request.equipment.co).toEqual({ File: 'items/armors/ShadowKnight.swf', Link: 'ShadowKnight' });
    });

    it('falls back to the class when the cosmetic view has no armor', () => {
        const { request } = buildRenderRequest(sampleParams({ strArmorFile: 'none', strArmorLink: '' }), 'cosmetic');
        expect(request.equipment.co).toEqual({ File: 'items/classes/VoidHighlord.swf', Link: 'VoidHighlord' });
    });

    it('changes only the class slot between views', () => {
        const params = sampleParams({ ia1: '5', intColorHair: '-3' });
        const equipped = buildRenderRequest(params, 'equipped').request;
        const cosmetic = buildRenderRequest(params, 'cosmetic').request;

        expect(cosmetic.equipment.co).not.toEqual(equipped.equipment.co);
        expect({ ...cosmetic, equipment: { ...cosmetic.equipment, co: equipped.equipment.co } }).toEqual(equipped);
    });

    it('is deterministic down to the serialized JSON', () => {
        const params = sampleParams({ ia1: '6' });
        const first = JSON.stringify(buildRenderRequest(params, 'equipped').request);
        const second = JSON.stringify(buildRenderRequest(sampleParams({ ia1: '6' }), 'equipped').request);
        expect(second).toBe(first);
    });

    it('keeps hidden slots in the request', () => {
        const { request } = buildRenderRequest(sampleParams({ ia1: '7' }), 'equipped');

        expect(request.visibility).toEqual({ hideCape: true, hideHelm: true, hidePet: true });
        expect(request.ia1).toBe(7);
        expect(request.equipment.ba).toEqual({ File: 'items/capes/Wings.swf', Link: 'Wings' });
        expect(request.equipment.he).toEqual({ File: 'items/helms/Hood.swf', Link: 'Hood' });
        expect(request.equipment.pe).toEqual({ File: 'items/pets/Moglin.swf', Link: 'Moglin' });
    });

    it('clamps out-of-range colors and reports each clamp', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        try {
            const { request, warnings } = buildRenderRequest(
                sampleParams({ intColorHair: '-5', intColorTrim: '16777216' }),
                'equipped'
            );

            expect(request.intColorHair).toBe(0);
            expect(request.intColorTrim).toBe(16777215);
            expect(warnings).toEqual([
                { field: 'intColorHair', value: -5, clampedTo: 0 },
                { field: 'intColorTrim', value: 16777216, clampedTo: 16777215 },
            ]);
            expect(warn).toHaveBeenCalledTimes(2);
        } finally {
            warn.mockRestore();
        }
    });

    it('defaults the hair to the gender base hair', () => {
        const { request } = buildRenderRequest(sampleParams({ strGender: 'M', strHairFile: '', strHairName: '' }), 'equipped');
        expect(request.hair).toEqual({ File: 'hair/M/Normal.swf', Name: 'Default' });
    });

    it('appends a slash to a custom asset base URL', () => {
        const { request } = buildRenderRequest(sampleParams(), 'equipped', { assetBaseUrl: 'https://assets.example.test/game' });
        expect(request.url).toBe('https://assets.example.test/game/');
        expect(request.swf).toBe('https://assets.example.test/game/etc/chardetail/characterB.swf?v=2');
    });
});
