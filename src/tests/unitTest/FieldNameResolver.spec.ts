import { UnresolvedFieldError } from '../../core/errors';
import { silentLogger } from '../../core/utils/Logger';
import { CUSTOM_FIELD_TOKEN, FieldNameResolver } from '../../ExtractService/FieldNameResolver';
import { Table, parsePath } from '../../ExtractService/Table';
import { FakeTicketSource } from '../helpers/FakeTicketSource';

function tableOf(...names: string[]): Table {
  return new Table(
    names.map((name, i) => ({ path: parsePath(name), values: [i] })),
    1,
  );
}

describe('FieldNameResolver', () => {
  const resolver = FieldNameResolver.fromEntries([
    { id: 'customfield_10101', name: 'Time to resolution' },
    { id: 'customfield_12985', name: 'Tribe/Squad' },
  ]);

  it('remplace uniquement le segment identifiant', () => {
    const renamed = resolver.apply(tableOf('fields.customfield_10101.completedCycles.breached', 'fields.customfield_12985.child.value'));
    expect(renamed.names).toEqual(['fields.Time to resolution.completedCycles.breached', 'fields.Tribe/Squad.child.value']);
    expect(renamed.column('fields.Tribe/Squad.child.value')?.values).toEqual([1]);
  });

  it('laisse inchangées les colonnes sans identifiant', () => {
    const table = tableOf('key', 'fields.status.name', 'fields.customfield', 'fields.customfield_12x');
    expect(resolver.apply(table).names).toEqual(table.names);
  });

  it('lève une erreur fatale pour un identifiant inconnu', () => {
    expect(() => resolver.apply(tableOf('key', 'fields.customfield_99999.value'))).toThrow(UnresolvedFieldError);
    expect(() => resolver.resolvePath(['fields', 'customfield_99999'])).toThrow("Champ personnalisé 'customfield_99999' absent de la table de correspondance");
  });

  it('reconnaît le motif customfield_<chiffres>', () => {
    expect(CUSTOM_FIELD_TOKEN.test('customfield_10420')).toBe(true);
    expect(CUSTOM_FIELD_TOKEN.test('customfield_')).toBe(false);
    expect(CUSTOM_FIELD_TOKEN.test('xcustomfield_1')).toBe(false);
  });

  it('récupère la table de correspondance une seule fois auprès de la source', async () => {
    const source = new FakeTicketSource([], [{ id: 'customfield_10420', name: 'Reason for Pending' }]);
    const fetched = await FieldNameResolver.fetch(source, silentLogger);

    expect(source.fieldLookups).toBe(1);
    expect(fetched.size).toBe(1);
    expect(fetched.resolvePath(parsePath('fields.customfield_10420.value'))).toEqual(['fields', 'Reason for Pending', 'value']);
  });
});
