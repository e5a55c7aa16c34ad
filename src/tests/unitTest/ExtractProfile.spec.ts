import * as path from 'path';
import { besideProfile, columnTypes, loadProfile, outputName, parseProfile, toProjection } from '../../config/ExtractProfile';
import { ConfigurationError } from '../../core/errors';
import { FileLoader } from '../../core/utils/FileLoader';
import { LocalTransport } from '../../core/utils/transports/LocalTransport';
import { S3Transport } from '../../core/utils/transports/S3Transport';

describe('ExtractProfile', () => {
  const repoRoot = path.resolve(__dirname, '..', '..', '..');
  const minimal = {
    query: 'project = SD',
    fields: ['summary'],
    columns: [{ path: 'key', label: 'Ticket Number', type: 'Text' }, { path: 'fields.summary' }],
    destination: { table: 'jira_sd' },
  };

  beforeEach(() => {
    FileLoader.resetInstance();
  });

  describe('profil livré (config/)', () => {
    it('charge le profil et son fichier de colonnes CSV', async () => {
      const loader = FileLoader.getInstance(repoRoot, [new LocalTransport(repoRoot)]);
      const profile = await loadProfile('config/service-desk-extract.json', loader);

      expect(profile.pageSize).toBe(1000);
      expect(profile.destination).toEqual({ table: 'jira_sd', batchSize: 1000 });
      expect(profile.fields).toContain('customfield_10101');
      expect(profile.expansions).toHaveLength(4);
      expect(profile.expansions[0]).toEqual({
        column: 'fields.customfield_10101.completedCycles',
        keep: ['breached', 'goalDuration.millis', 'elapsedTime.millis'],
        dropOriginal: true,
      });
      expect(profile.columns).toHaveLength(27);
      expect(profile.columns[0]).toEqual({ path: 'key', label: 'Ticket Number', type: 'Text' });
    });

    it('produit des noms de sortie uniques et acceptés par postgres (63 octets max)', async () => {
      const loader = FileLoader.getInstance(repoRoot, [new LocalTransport(repoRoot)]);
      const profile = await loadProfile('config/service-desk-extract.json', loader);
      const names = profile.columns.map(outputName);

      expect(new Set(names).size).toBe(names.length);
      expect(names.filter((n) => Buffer.byteLength(n, 'utf8') > 63)).toEqual([]);
      expect(columnTypes(profile)['Resolution Goal (ms)']).toBe('BigInteger');
    });
  });

  it('accepte des colonnes en ligne et applique les valeurs par défaut', () => {
    const profile = parseProfile(minimal);
    expect(profile).toEqual({
      query: 'project = SD',
      fields: ['summary'],
      pageSize: 1000,
      expansions: [],
      columns: [{ path: 'key', label: 'Ticket Number', type: 'Text' }, { path: 'fields.summary' }],
      destination: { table: 'jira_sd', batchSize: 1000 },
    });
  });

  it('dérive la projection et les types', () => {
    const profile = parseProfile({
      ...minimal,
      columns: [
        { path: 'key', label: 'Ticket Number' },
        { path: 'fields.created', label: 'fields.created', type: 'DateTime' },
        { path: 'fields.summary' },
      ],
    });

    expect(toProjection(profile)).toEqual({ select: ['key', 'fields.created', 'fields.summary'], rename: { key: 'Ticket Number' } });
    expect(columnTypes(profile)).toEqual({ 'fields.created': 'DateTime' });
  });

  it('exige soit columns, soit columnsFile', () => {
    const { columns: _columns, ...withoutColumns } = minimal;
    expect(() => parseProfile(withoutColumns)).toThrow('profil invalide: columns: définir soit columns, soit columnsFile');
    expect(() => parseProfile({ ...minimal, columnsFile: 'cols.csv' })).toThrow(ConfigurationError);
  });

  it('refuse un nom de table de destination invalide', () => {
    expect(() => parseProfile({ ...minimal, destination: { table: 'jira-sd' } }, 'p.json')).toThrow('p.json invalide: destination.table: nom de table invalide');
  });

  it('traite les cellules CSV vides comme absentes et valide les types', () => {
    const { columns: _columns, ...rest } = minimal;
    const profile = parseProfile({ ...rest, columnsFile: 'cols.csv' }, 'p.json', [
      { path: 'key', label: 'Ticket Number', type: 'Text' },
      { path: 'fields.summary', label: '', type: ' ' },
    ]);
    expect(profile.columns).toEqual([{ path: 'key', label: 'Ticket Number', type: 'Text' }, { path: 'fields.summary' }]);

    expect(() => parseProfile({ ...rest, columnsFile: 'cols.csv' }, 'p.json', [{ path: 'key', label: '', type: 'Money' }])).toThrow(/^cols\.csv invalide: 0\.type: /);
  });

  it('charge un profil et ses colonnes depuis S3', async () => {
    const objects: Record<string, string> = {
      'cfg/extract/profile.json': JSON.stringify({ ...minimal, columns: undefined, columnsFile: 'columns.csv' }),
      'cfg/extract/columns.csv': 'path,label,type\nkey,Ticket Number,Text\n',
    };
    const loader = FileLoader.getInstance('/', [
      new S3Transport(async (bucket, key) => {
        const body = objects[`${bucket}/${key}`];
        if (body === undefined) throw new Error(`NoSuchKey: ${key}`);
        return { body };
      }),
    ]);

    const profile = await loadProfile('s3://cfg/extract/profile.json', loader);
    expect(profile.columns).toEqual([{ path: 'key', label: 'Ticket Number', type: 'Text' }]);
  });

  it('résout le fichier de colonnes à côté du profil', () => {
    expect(besideProfile('config/extract.json', 'cols.csv')).toBe(path.join('config', 'cols.csv'));
    expect(besideProfile('s3://bucket/a/b/extract.json', 'cols.csv')).toBe('s3://bucket/a/b/cols.csv');
    expect(besideProfile('config/extract.json', 's3://other/cols.csv')).toBe('s3://other/cols.csv');
    expect(besideProfile('config/extract.json', '/etc/cols.csv')).toBe('/etc/cols.csv');
  });
});
