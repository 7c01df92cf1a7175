import { describe, it, expect } from 'vitest';
import { HttpError } from '../lib/httpError.js';
import { parseAnalyzeRequest } from '../lib/requestParser.js';

describe('parseAnalyzeRequest', () => {
    it('defaults the style and keeps only known fields', () => {
        expect(parseAnalyzeRequest({ text: 'Hi.', extra: 1 })).toEqual({ text: 'Hi.', style: 'prose' });
    });

    it('copies optional fields in a fixed order', () => {
        const request = parseAnalyzeRequest({
            characterNames: ['Ada'],
            pageCountOverride: 3,
            style: 'screenplay',
            text: 'INT. ROOM - DAY',
            outline: [{ title: 'One', level: 1, rangeStart: 0, rangeEnd: 10 }],
            pageMapping: [{ location: 0, page: 1 }],
            characters: [{ name: 'Ada', aliases: ['Addie'] }, { name: 'Bo' }],
        });
        expect(Object.keys(request)).toEqual([
            'text',
            'style',
            'outline',
            'pageMapping',
            'pageCountOverride',
            'characters',
            'characterNames',
        ]);
        expect(request.characters).toEqual([{ name: 'Ada', aliases: ['Addie'] }, { name: 'Bo' }]);
    });

    it('throws a 400 HttpError for invalid input', () => {
        const cases: Array<[unknown, string]> = [
            [[], 'Request body must be a JSON object'],
            [{ text: '   ' }, 'text must be a non-empty string'],
            [{ text: 'x', pageCountOverride: 0 }, 'pageCountOverride must be a positive number'],
            [{ text: 'x', outline: {} }, 'outline must be an array'],
            [
                { text: 'x', outline: [{ title: 'A', level: 1, rangeStart: 5, rangeEnd: 2 }] },
                'outline[0] must have a title, a level and a valid range',
            ],
            [{ text: 'x', pageMapping: [{ location: -1, page: 1 }] }, 'pageMapping[0] must have a location and a page'],
            [{ text: 'x', characters: [{ name: '' }] }, 'characters[0] must have a name'],
            [{ text: 'x', characters: [{ name: 'A', aliases: [1] }] }, 'characters[0].aliases must be an array of strings'],
            [{ text: 'x', characterNames: ['A', 2] }, 'characterNames[1] must be a string'],
        ];
        for (const [body, message] of cases) {
            let caught: unknown;
            try {
                parseAnalyzeRequest(body);
            } catch (err) {
                caught = err;
            }
            expect(caught).toBeInstanceOf(HttpError);
            expect(caught).toMatchObject({ status: 400, message });
        }
    });
});
