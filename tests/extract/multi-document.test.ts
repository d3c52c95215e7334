import { splitMultiDocument } from '../../src/extract/multi-document';

describe('splitMultiDocument', () => {
  test('files three documents under their lower-cased kinds', () => {
    const input =
      'kind: Deployment\nmetadata:\n  name: web\n---\n' +
      'kind: Service\nmetadata:\n  name: web-service\n---\n' +
      'kind: Ingress\nmetadata:\n  name: web-ingress\n';

    expect(splitMultiDocument(input)).toEqual({
      deployment: 'kind: Deployment\nmetadata:\n  name: web',
      service: 'kind: Service\nmetadata:\n  name: web-service',
      ingress: 'kind: Ingress\nmetadata:\n  name: web-ingress',
    });
  });

  test('handles documents closed with an end marker', () => {
    const input = 'kind: Deployment\n...\n---\nkind: Service\n...\n---\nkind: Ingress\n...';
    expect(Object.keys(splitMultiDocument(input)).sort()).toEqual(['deployment', 'ingress', 'service']);
  });

  test('a repeated kind keeps the later document', () => {
    const input = 'kind: Service\nmetadata:\n  name: first\n---\nkind: Service\nmetadata:\n  name: second';
    expect(splitMultiDocument(input)).toEqual({
      service: 'kind: Service\nmetadata:\n  name: second',
    });
  });

  test('drops a document with no kind and no known marker', () => {
    const input = 'kind: Deployment\nmetadata:\n  name: web\n---\nfoo: bar\n---\nkind: Service';
    const result = splitMultiDocument(input);
    expect(Object.keys(result).sort()).toEqual(['deployment', 'service']);
  });

  test('reports each dropped document to onDrop', () => {
    const onDrop = jest.fn();
    splitMultiDocument('kind: Deployment\nmetadata:\n  name: web\n---\nfoo: bar\n', { onDrop });
    expect(onDrop).toHaveBeenCalledTimes(1);
    expect(onDrop).toHaveBeenCalledWith('foo: bar', 1);
  });

  test('keeps unlisted kinds', () => {
    const input = 'apiVersion: v1\nkind: ConfigMap\ndata:\n  a: b';
    expect(splitMultiDocument(input)).toEqual({ configmap: input });
  });

  test('falls back to the literal marker when YAML parsing fails', () => {
    const input = 'apiVersion: v1\nkind: Service\nspec: {ports: [';
    expect(splitMultiDocument(input)).toEqual({ service: input });
  });

  test('marker search prefers Deployment over Service', () => {
    const input = 'kind: Deployment\nspec: {selector: [Service';
    expect(splitMultiDocument(input)).toEqual({ deployment: input });
  });

  test('a trailing prose note does not replace a parsed manifest', () => {
    const onDrop = jest.fn();
    const input =
      'kind: Deployment\nmetadata:\n  name: web\n---\n' +
      'kind: Service\nmetadata:\n  name: web-service\n---\n' +
      'Note: the Service above is ClusterIP.';

    expect(splitMultiDocument(input, { onDrop })).toEqual({
      deployment: 'kind: Deployment\nmetadata:\n  name: web',
      service: 'kind: Service\nmetadata:\n  name: web-service',
    });
    expect(onDrop).toHaveBeenCalledWith('Note: the Service above is ClusterIP.', 2);
  });

  test('a parsed mapping without kind is dropped even when it mentions a marker', () => {
    const onDrop = jest.fn();
    expect(splitMultiDocument('apiVersion: v1\nmetadata:\n  name: Service-x', { onDrop })).toEqual({});
    expect(onDrop).toHaveBeenCalledWith('apiVersion: v1\nmetadata:\n  name: Service-x', 0);
  });

  test('a plain-text document is dropped', () => {
    expect(splitMultiDocument('This block describes the Ingress')).toEqual({});
  });

  test('a parsed list is dropped', () => {
    expect(splitMultiDocument('- Deployment\n- Service')).toEqual({});
  });

  test('a non-string kind falls back to marker search', () => {
    const input = 'kind: 42\nmetadata:\n  name: Service-x';
    expect(splitMultiDocument(input)).toEqual({ service: input });
  });

  test('a non-string kind without markers is dropped', () => {
    expect(splitMultiDocument('kind: 42\nmetadata:\n  name: x')).toEqual({});
  });

  test('an empty kind is dropped', () => {
    expect(splitMultiDocument('kind: ""\nmetadata:\n  name: Service-x')).toEqual({});
  });

  test('skips empty and whitespace-only fragments without reporting them', () => {
    const onDrop = jest.fn();
    expect(splitMultiDocument('', { onDrop })).toEqual({});
    expect(splitMultiDocument('---\n   \n---\n', { onDrop })).toEqual({});
    expect(onDrop).not.toHaveBeenCalled();
  });

  test('splits on the separator even inside a line', () => {
    const input = 'kind: Service\nmetadata:\n  name: a---b';
    expect(splitMultiDocument(input)).toEqual({ service: 'kind: Service\nmetadata:\n  name: a' });
  });

  test('never throws on malformed input', () => {
    for (const input of ['\t- [', ': : :', '---\n{{{\n---', '\u0000', '"unterminated']) {
      expect(() => splitMultiDocument(input)).not.toThrow();
    }
  });
});
