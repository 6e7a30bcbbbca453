import { deleteDuplicates, parseProxyToUrl, percentage, progressBar, truncateUrl } from '~/utils';

describe('deleteDuplicates', () => {
    it('keeps first occurrences in order', () => {
        expect(deleteDuplicates([ 'b', 'a', 'b', 'c', 'a' ])).toEqual([ 'b', 'a', 'c' ]);
    });

    it('returns as many items as there are distinct values', () => {
        const input = [ '1.1.1.1:80', '2.2.2.2:80', '1.1.1.1:80', '3.3.3.3:80', '2.2.2.2:80' ];

        expect(deleteDuplicates(input)).toHaveLength(new Set(input).size);
    });

    it('is idempotent', () => {
        const once = deleteDuplicates([ 'x', 'y', 'x', 'z' ]);

        expect(deleteDuplicates(once)).toEqual(once);
    });

    it('compares exactly, without normalizing', () => {
        expect(deleteDuplicates([ '1.1.1.1:80', '1.1.1.1:080' ])).toEqual([ '1.1.1.1:80', '1.1.1.1:080' ]);
    });

    it('accepts a key function', () => {
        const items = [ { id: 1, v: 'a' }, { id: 2, v: 'b' }, { id: 1, v: 'c' } ];

        expect(deleteDuplicates(items, (item) => item.id).map((item) => item.v)).toEqual([ 'a', 'b' ]);
    });

    it('handles large inputs', () => {
        const input = Array.from({ length: 50_000 }, (_, i) => `10.0.${ i % 250 }.1:${ i % 1000 }`);
        const result = deleteDuplicates(input);

        expect(result).toHaveLength(new Set(input).size);
        expect(result[0]).toBe('10.0.0.1:0');
    });
});

describe('progressBar', () => {
    it('fills floor(percentage / 100 * width) cells', () => {
        expect(progressBar(50, 10)).toBe('[█████░░░░░]');
        expect(progressBar(33, 10)).toBe('[███░░░░░░░]');
    });

    it('clamps to the width', () => {
        expect(progressBar(150, 4)).toBe('[████]');
        expect(progressBar(-20, 4)).toBe('[░░░░]');
    });
});

describe('percentage', () => {
    it('treats an empty total as complete', () => {
        expect(percentage(0, 0)).toBe(100);
    });

    it('divides done by total', () => {
        expect(percentage(1, 4)).toBe(25);
    });
});

describe('parseProxyToUrl', () => {
    it('uses the family scheme', () => {
        expect(parseProxyToUrl('1.2.3.4:8080', 'HTTP')).toBe('http://1.2.3.4:8080');
        expect(parseProxyToUrl('1.2.3.4:1080', 'SOCKS5')).toBe('socks5://1.2.3.4:1080');
    });
});

describe('truncateUrl', () => {
    it('keeps short urls', () => {
        expect(truncateUrl('http://a.b/c', 20)).toBe('http://a.b/c');
    });

    it('cuts long urls with an ellipsis', () => {
        expect(truncateUrl('http://example.com/list.txt', 12)).toBe('http://ex...');
    });
});
