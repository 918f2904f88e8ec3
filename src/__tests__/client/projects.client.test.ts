import { MetavaultClient } from '../../client/metavault.client';
import { NotFoundError } from '../../utils/errors';
import { FakeTransport } from '../helpers/fake-transport';
import { BASE_URL, page } from '../helpers/fixtures';

describe('ProjectsClient', () => {
  let transport: FakeTransport;
  let client: MetavaultClient;

  beforeEach(() => {
    transport = new FakeTransport();
    client = new MetavaultClient(BASE_URL, transport);
  });

  it('lists the projects the caller can read', async () => {
    transport.on(
      'GET',
      '/metavault/api/projects?onlyAffected=true',
      page('projects', [{ id: 'p-1', name: 'P1', technicalName: 'p1', _links: { self: { href: '/p-1' } } }]),
    );

    const result = await client.projects.list();

    expect(result.total).toBe(1);
    expect(result.items).toEqual([{ id: 'p-1', name: 'P1', technicalName: 'p1' }]);
  });

  it('finds a project by exact name and takes the first of several', async () => {
    transport.on(
      'GET',
      '/metavault/api/projects?filter=name+eq+P1',
      page('projects', [
        { id: 'p-1', name: 'P1' },
        { id: 'p-2', name: 'P1' },
      ]),
    );

    await expect(client.projects.findByName('P1')).resolves.toEqual({ id: 'p-1', name: 'P1' });
  });

  it('fails with NotFoundError when no project has the name', async () => {
    transport.on('GET', '/metavault/api/projects?filter=name+eq+Nope', page('projects', []));

    const error = await client.projects.findByName('Nope').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toHaveProperty('message', "Project 'Nope' not found");
  });
});
