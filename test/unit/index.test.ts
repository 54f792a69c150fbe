import * as api from '../../src/index.js';

describe('library entry point', () => {
  it('builds results through Success and Failure', () => {
    expect(api.Success(3)).toEqual({ ok: true, value: 3 });
    expect(api.Failure('Invalid port: "http"')).toEqual({ ok: false, error: 'Invalid port: "http"' });
  });

  it('exports the result constructors without unused helpers', () => {
    expect(Object.keys(api)).toEqual(expect.arrayContaining(['Success', 'Failure', 'parseCompose', 'validateProject']));
    expect(Object.keys(api)).not.toContain('mapResult');
    expect(Object.keys(api)).not.toContain('isOk');
    expect(Object.keys(api)).not.toContain('isFail');
  });

  it('validates a parsed document end to end', () => {
    const parsed = api.parseCompose('services:\n  app:\n    image: example/app:1.0.0\n    ports: ["8080:80"]\n');
    if (!parsed.ok) throw new Error(parsed.error);

    expect(api.validateProject(parsed.value.project)).toEqual({ valid: true, errors: [], warnings: [] });
  });
});
