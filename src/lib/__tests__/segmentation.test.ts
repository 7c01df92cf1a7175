import { describe, it, expect } from 'vitest';
import {
    tokenizeWords,
    countWords,
    cleanToken,
    splitSentences,
    countSentences,
    paragraphStats,
    splitChaptersByHeading,
    splitIntoChapters,
    poetryBodyLines,
    splitStanzas,
    tokenizePoemWords,
} from '../segmentation';

// ─── WORDS ─────────────────────────────────────────────────────────

describe('tokenizeWords', () => {
    it('splits on whitespace and keeps punctuation', () => {
        expect(tokenizeWords('  Hello,  world! ')).toEqual(['Hello,', 'world!']);
    });

    it('returns empty array for blank input', () => {
        expect(tokenizeWords('   \n\t')).toEqual([]);
        expect(countWords('')).toBe(0);
    });
});

describe('cleanToken', () => {
    it('strips edge punctuation and lowercases', () => {
        expect(cleanToken('"Quickly!"')).toBe('quickly');
    });

    it('keeps inner apostrophes', () => {
        expect(cleanToken("Don't.")).toBe("don't");
    });
});

// ─── SENTENCES ─────────────────────────────────────────────────────

describe('splitSentences', () => {
    it('splits on terminal punctuation without trimming', () => {
        expect(splitSentences('One two. Three! Four?')).toEqual(['One two', ' Three', ' Four']);
    });

    it('drops the empty fragments an ellipsis produces', () => {
        expect(countSentences('Wait... what?')).toBe(2);
    });
});

// ─── PARAGRAPHS ────────────────────────────────────────────────────

describe('paragraphStats', () => {
    it('counts non-blank lines and floors the average', () => {
        expect(paragraphStats('One two three.\n\nFour five.\n')).toEqual({
            paragraphCount: 2,
            averageParagraphLength: 2,
            longParagraphs: [],
        });
    });

    it('flags paragraphs over 150 words by 1-based index', () => {
        const text = `Short one.\n${'word '.repeat(151)}`;
        expect(paragraphStats(text).longParagraphs).toEqual([2]);
    });

    it('reports zeros for empty text', () => {
        expect(paragraphStats('')).toEqual({
            paragraphCount: 0,
            averageParagraphLength: 0,
            longParagraphs: [],
        });
    });
});

// ─── CHAPTERS ──────────────────────────────────────────────────────

describe('splitChaptersByHeading', () => {
    it('opens a chapter at each heading line', () => {
        const chapters = splitChaptersByHeading('Chapter 1\nAlpha.\nChapter 2\nBeta.');
        expect(chapters).toEqual([
            { number: 1, title: 'Chapter 1', text: 'Chapter 1\nAlpha.\n', startOffset: 0 },
            { number: 2, title: 'Chapter 2', text: 'Chapter 2\nBeta.\n', startOffset: 17 },
        ]);
    });

    it('returns the whole text as one chapter when no heading is found', () => {
        const chapters = splitChaptersByHeading('Just prose.');
        expect(chapters).toHaveLength(1);
        expect(chapters[0].number).toBe(1);
        expect(chapters[0].title).toBeUndefined();
        expect(chapters[0].text).toBe('Just prose.\n');
    });
});

describe('splitIntoChapters', () => {
    it('prefers level-one outline entries sorted by offset', () => {
        const text = 'AAAA BBBB CCCC';
        const chapters = splitIntoChapters(text, [
            { title: 'Two', level: 1, rangeStart: 5, rangeEnd: 14 },
            { title: 'One', level: 1, rangeStart: 0, rangeEnd: 5 },
            { title: 'Scene', level: 2, rangeStart: 10, rangeEnd: 14 },
        ]);
        expect(chapters).toEqual([
            { number: 1, title: 'One', text: 'AAAA ', startOffset: 0 },
            { number: 2, title: 'Two', text: 'BBBB CCCC', startOffset: 5 },
        ]);
    });

    it('falls back to headings when the outline is empty', () => {
        expect(splitIntoChapters('Chapter 1\nAlpha.', [])).toHaveLength(1);
    });

    it('clamps outline offsets past the end of the text', () => {
        const chapters = splitIntoChapters('abc', [
            { title: 'Only', level: 0, rangeStart: 10, rangeEnd: 20 },
        ]);
        expect(chapters).toEqual([{ number: 1, title: 'Only', text: '', startOffset: 3 }]);
    });
});

// ─── POEMS ─────────────────────────────────────────────────────────

describe('poetryBodyLines', () => {
    it('removes a short title block before the first blank line', () => {
        const lines = poetryBodyLines('Title\nBy Someone\n\nline one\nline two');
        expect(lines).toEqual(['line one', 'line two']);
    });

    it('normalises carriage returns', () => {
        expect(poetryBodyLines('a,\r\nb.')).toEqual(['a,', 'b.']);
    });
});

describe('splitStanzas', () => {
    it('groups contiguous non-blank lines', () => {
        expect(splitStanzas(['a', 'b', '', '  ', 'c'])).toEqual([['a', 'b'], ['c']]);
    });
});

describe('tokenizePoemWords', () => {
    it('keeps letters and apostrophes only', () => {
        expect(tokenizePoemWords("The night's cold, O-moon!")).toEqual([
            'the',
            "night's",
            'cold',
            'o',
            'moon',
        ]);
    });
});
