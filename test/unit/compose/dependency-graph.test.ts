import {
  buildDependencyGraph,
  findCycles,
  formatCycle,
  startupTiers,
} from '../../../src/compose/dependency-graph.js';
import { parseCompose } from '../../../src/compose/parser.js';
import type { ComposeProject } from '../../../src/domain/types/compose.js';
import { readComposeFixture } from '../../__support__/fixtures/compose/index.js';

function projectOf(text: string): ComposeProject {
  const result = parseCompose(text);
  if (!result.ok) throw new Error(result.error);
  return result.value.project;
}

describe('dependency graph', () => {
  it('starts the database before the backend', () => {
    const project = projectOf(readComposeFixture('db-backend.yml'));
    expect(startupTiers(project)).toEqual({ ok: true, value: [['db'], ['backend']] });
  });

  it('groups independent services into one tier', () => {
    const project = projectOf(`
services:
  web:
    image: example/web:1.0.0
    depends_on: [api, cache]
  api:
    image: example/api:1.0.0
    depends_on: [db]
  cache:
    image: redis:7.2
  db:
    image: postgres:16
`);
    expect(startupTiers(project)).toEqual({ ok: true, value: [['cache', 'db'], ['api'], ['web']] });
  });

  it('separates unknown dependencies from edges', () => {
    const graph = buildDependencyGraph(projectOf(readComposeFixture('dependency-cycle.yml')));

    expect(graph.nodes).toEqual(['a', 'b', 'c', 'd']);
    expect(graph.edges.get('d')).toEqual([]);
    expect(graph.unknown).toEqual([{ service: 'd', dependency: 'ghost' }]);
  });

  it('finds each cycle once', () => {
    const graph = buildDependencyGraph(projectOf(readComposeFixture('dependency-cycle.yml')));
    const cycles = findCycles(graph);

    expect(cycles).toEqual([['a', 'b', 'c']]);
    expect(cycles.map(formatCycle)).toEqual(['a -> b -> c -> a']);
  });

  it('treats a self-dependency as a cycle', () => {
    const graph = buildDependencyGraph(
      projectOf('services:\n  loop:\n    image: example/loop:1.0.0\n    depends_on: [loop]\n'),
    );
    expect(findCycles(graph)).toEqual([['loop']]);
  });

  it('cannot order a cyclic project', () => {
    expect(startupTiers(projectOf(readComposeFixture('dependency-cycle.yml')))).toEqual({
      ok: false,
      error: 'Dependency cycle: a -> b -> c -> a',
    });
  });
});
