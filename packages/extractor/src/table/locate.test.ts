import type { TableSpec } from '@tablesweep/shared';
import { locateTable } from './locate';

const html = `
  <html><body>
    <table id="nav"><tr><td>Menu</td></tr></table>
    <table class="data"><tr><td>first</td></tr></table>
    <table class="data"><tr><td>second</td></tr></table>
  </body></html>
`;

function spec(selector: string, tableIndex = 0): TableSpec {
  return { selector, tableIndex, headerStrategy: 'auto' };
}

describe('locateTable', () => {
  it('should return the first match by default', () => {
    const table = locateTable(html, spec('table'));

    expect(table?.attr('id')).toBe('nav');
  });

  it('should return a table element', () => {
    const table = locateTable(html, spec('.data'));

    expect(table?.get(0)?.tagName).toBe('table');
  });

  it('should return the match at the requested index', () => {
    const table = locateTable(html, spec('table.data', 1));

    expect(table?.text().trim()).toBe('second');
  });

  it('should return null when the index is out of range', () => {
    expect(locateTable(html, spec('table.data', 2))).toBeNull();
  });

  it('should return null when nothing matches', () => {
    expect(locateTable(html, spec('table.missing'))).toBeNull();
  });

  it('should return null for an invalid selector', () => {
    expect(locateTable(html, spec('table['))).toBeNull();
  });

  it('should find tables in unclosed markup', () => {
    const broken = '<div><table class="data"><tr><td>cell';

    expect(locateTable(broken, spec('.data'))?.text()).toBe('cell');
  });
});
