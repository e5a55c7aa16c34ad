import * as path from 'path';
import { promises as fs } from 'fs';
import { AuditService, type AuditEvent, type AuditTransport } from '../../core/utils/AuditService';
import { FileLoader } from '../../core/utils/FileLoader';
import { LocalTransport } from '../../core/utils/transports/LocalTransport';

class MemoryTransport implements AuditTransport {
  public entries: AuditEvent[] = [];

  async log(event: AuditEvent): Promise<void> {
    this.entries.push(event);
  }
}

describe('Intégration Audit FileLoader', () => {
  const fixturesDir = path.resolve(__dirname, 'fixtures', 'audit');
  let loader: FileLoader;
  let transport: MemoryTransport;

  beforeAll(async () => {
    await fs.mkdir(fixturesDir, { recursive: true });
    await fs.writeFile(path.join(fixturesDir, 'test.json'), JSON.stringify({ foo: 'bar' }), 'utf-8');
  });

  beforeEach(() => {
    AuditService.resetInstance();
    FileLoader.resetInstance();
    transport = new MemoryTransport();
    AuditService.getInstance([transport]);
    loader = FileLoader.getInstance(fixturesDir, [new LocalTransport(fixturesDir)]);
  });

  afterAll(() => {
    AuditService.resetInstance();
    FileLoader.resetInstance();
  });

  it('doit émettre FILE_LOAD_START et FILE_LOADED en cas de succès', async () => {
    const meta = await loader.load('test.json');

    expect(transport.entries.map((e) => [e.event, e.resource, e.status])).toEqual([
      ['FILE_LOAD_START', 'test.json', 'INIT'],
      ['FILE_LOADED', 'test.json', 'SUCCESS'],
    ]);
    expect(transport.entries[1].details).toEqual({ fingerprint: meta.fingerprint, updatedAt: meta.updatedAt.toISOString() });
  });

  it("doit émettre FILE_LOAD_ERROR en cas d'échec", async () => {
    await expect(loader.load('missing.json')).rejects.toThrow();

    expect(transport.entries.map((e) => [e.event, e.status])).toEqual([
      ['FILE_LOAD_START', 'INIT'],
      ['FILE_LOAD_ERROR', 'FAILURE'],
    ]);
  });

  it("n'audite pas une lecture servie par le cache", async () => {
    await loader.load('test.json');
    await loader.load('test.json');
    expect(transport.entries).toHaveLength(2);
  });
});
