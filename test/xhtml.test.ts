import { normalizeXhtml, stripMarkup } from '../src/xhtml';

describe('normalizeXhtml', () => {
    it('should put block elements on their own lines and collapse whitespace', () => {
        const text = normalizeXhtml('<p>Hello   <b>world</b></p><p>Second\n   line</p>');
        expect(text).toBe('Hello world\nSecond line');
    });

    it('should list items line by line', () => {
        expect(normalizeXhtml('<ul><li>One</li><li>Two</li></ul>')).toBe('One\nTwo');
    });

    it('should separate table cells with a space and rows with a line break', () => {
        const text = normalizeXhtml('<table><tr><td>a</td><td>b</td></tr><tr><td>c</td></tr></table>');
        expect(text).toBe('a b\nc');
    });

    it('should break lines at br', () => {
        expect(normalizeXhtml('first<br/>second')).toBe('first\nsecond');
    });

    it('should ignore namespace prefixes', () => {
        const markup = '<xhtml:div xmlns:xhtml="http://www.w3.org/1999/xhtml"><xhtml:p>Hi</xhtml:p><xhtml:p>there</xhtml:p></xhtml:div>';
        expect(normalizeXhtml(markup)).toBe('Hi\nthere');
    });

    it('should return plain text unchanged', () => {
        expect(normalizeXhtml('plain text')).toBe('plain text');
    });

    it('should return an empty string for empty input', () => {
        expect(normalizeXhtml('')).toBe('');
        expect(normalizeXhtml('<p>  </p>')).toBe('');
    });

    it('should fall back to stripping tags when the markup is not well-formed', () => {
        const text = normalizeXhtml('<p>Unclosed <b>bold</p> &amp; more');
        expect(text).toBe('Unclosed bold\n& more');
    });

    it('should give the same text for the same markup', () => {
        const markup = '<div><p>Alpha</p>beta</div>';
        expect(normalizeXhtml(markup)).toBe(normalizeXhtml(markup));
        expect(normalizeXhtml(markup)).toBe('Alpha\nbeta');
    });
});

describe('stripMarkup', () => {
    it('should decode entities', () => {
        expect(stripMarkup('a&nbsp;b &#65; &#x42; &bogus;')).toBe('a b A B &bogus;');
    });

    it('should keep out-of-range character references as they are', () => {
        expect(stripMarkup('x &#99999999; y')).toBe('x &#99999999; y');
    });

    it('should drop a dangling tag at the end', () => {
        expect(stripMarkup('text <span')).toBe('text');
    });

    it('should keep comparison signs that are not tags', () => {
        expect(normalizeXhtml('Force < 500 N and > 10 N')).toBe('Force < 500 N and > 10 N');
        expect(stripMarkup('<b>x</b> <3 <!-- note --> y')).toBe('x <3 y');
    });

    it('should only decode the entities it knows', () => {
        expect(stripMarkup('a &constructor; &toString; b')).toBe('a &constructor; &toString; b');
    });
});
