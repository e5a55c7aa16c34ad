import { ConfigurationError, MissingColumnError } from '../../core/errors';
import { project } from '../../ExtractService/Projector';
import { Table, parsePath } from '../../ExtractService/Table';

describe('project', () => {
  const table = new Table(
    [
      { path: parsePath('key'), values: ['SD-1', 'SD-2'] },
      { path: parsePath('fields.summary'), values: ['Imprimante', 'VPN'] },
      { path: parsePath('fields.status.name'), values: ['Open', 'Done'] },
      { path: parsePath('fields.Reason for Pending.value'), values: [null, 'Client'] },
    ],
    2,
  );

  it("sélectionne les colonnes dans l'ordre demandé et renomme une partie", () => {
    const output = project(table, {
      select: ['fields.status.name', 'key', 'fields.Reason for Pending.value'],
      rename: { key: 'Ticket Number', 'fields.status.name': 'Status' },
    });

    expect(output.names).toEqual(['Status', 'Ticket Number', 'fields.Reason for Pending.value']);
    expect([...output.rows()]).toEqual([
      ['Open', 'SD-1', null],
      ['Done', 'SD-2', 'Client'],
    ]);
  });

  it('un libellé contenant un point reste un seul nom de colonne', () => {
    const output = project(table, { select: ['key'], rename: { key: 'Ticket No.' } });
    expect(output.columns[0].path).toEqual(['Ticket No.']);
  });

  it('lève MissingColumnError pour une colonne absente', () => {
    expect(() => project(table, { select: ['key', 'fields.priority.name'], rename: {} })).toThrow(MissingColumnError);
  });

  it('refuse un libellé pour une colonne non sélectionnée', () => {
    expect(() => project(table, { select: ['key'], rename: { 'fields.summary': 'Summary' } })).toThrow(ConfigurationError);
  });

  it('refuse deux colonnes de sortie de même nom', () => {
    expect(() => project(table, { select: ['key', 'fields.summary'], rename: { 'fields.summary': 'key' } })).toThrow("Colonne 'key' en double");
  });
});
