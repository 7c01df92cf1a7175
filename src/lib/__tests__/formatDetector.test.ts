import { describe, it, expect } from 'vitest';
import { detectFormat, scoreFormat, defaultFormatDetector } from '../formatDetector';

const SCREENPLAY = 'INT. KITCHEN - DAY\n\nJOHN\nHello there.\n\nMARY\nFine.\n\n'.repeat(12);
const NOVEL = 'She thought about the letter, and the house was quiet that night. '.repeat(10);

describe('detectFormat', () => {
    it('defaults to novel for short text', () => {
        expect(detectFormat('INT. KITCHEN - DAY')).toEqual({ format: 'novel', confidence: 0.5 });
    });

    it('recognises sluglines and cues as a screenplay', () => {
        expect(detectFormat(SCREENPLAY)).toEqual({ format: 'screenplay', confidence: 1 });
    });

    it('recognises interior narration as a novel', () => {
        const result = detectFormat(NOVEL);
        expect(result.format).toBe('novel');
        expect(result.confidence).toBeCloseTo(60 / 62, 5);
    });

    it('is exposed through the default detector', () => {
        expect(defaultFormatDetector.detectFormat(NOVEL).format).toBe('novel');
    });
});

describe('scoreFormat', () => {
    it('weights novel evidence and layout separately', () => {
        expect(scoreFormat(NOVEL)).toEqual({ screenplay: 2, novel: 60 });
    });
});
