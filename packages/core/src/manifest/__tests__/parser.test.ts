import { describe, it, expect } from 'vitest';
import { parseManifest, MANIFEST_NAMESPACE } from '../parser.js';
import { ErrorCode, ManifestParseError } from '../../errors.js';

function manifest(body: string, rootAttributes = ` xmlns="${MANIFEST_NAMESPACE}"`): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n<Package${rootAttributes}>\n${body}\n</Package>\n`;
}

function parseError(xml: string): ManifestParseError {
  try {
    parseManifest(xml);
  } catch (error) {
    if (error instanceof ManifestParseError) return error;
    throw error;
  }
  expect.fail('should have thrown');
}

describe('parseManifest', () => {
  it('collects members in document order per types block', () => {
    const result = parseManifest(
      manifest(`
  <types>
    <members>AccountHandler</members>
    <members>ContactService</members>
    <name>ApexClass</name>
  </types>
  <types>
    <members>AccountTrigger</members>
    <name>ApexTrigger</name>
  </types>
  <version>59.0</version>`)
    );

    expect(result.components).toEqual([
      { typeName: 'ApexClass', memberName: 'AccountHandler' },
      { typeName: 'ApexClass', memberName: 'ContactService' },
      { typeName: 'ApexTrigger', memberName: 'AccountTrigger' },
    ]);
    expect(result.version).toBe('59.0');
    expect(result.namespace).toBe(MANIFEST_NAMESPACE);
    expect(result.warnings).toEqual([]);
  });

  it('returns an empty list for a manifest without types', () => {
    const result = parseManifest(manifest('  <version>60.0</version>'));
    expect(result.components).toEqual([]);
    expect(result.version).toBe('60.0');
  });

  it('leaves version undefined when the element is absent', () => {
    const result = parseManifest(manifest('<types><members>A</members><name>ApexPage</name></types>'));
    expect(result.version).toBeUndefined();
  });

  it('accepts members declared after the name', () => {
    const result = parseManifest(
      manifest('<types><name>CustomObject</name><members>Account</members><members>Lead</members></types>')
    );
    expect(result.components).toEqual([
      { typeName: 'CustomObject', memberName: 'Account' },
      { typeName: 'CustomObject', memberName: 'Lead' },
    ]);
  });

  it('pairs members on either side of the name with that name', () => {
    const result = parseManifest(
      manifest('<types><members>Before</members><name>Flow</name><members>After</members></types>')
    );
    expect(result.components).toEqual([
      { typeName: 'Flow', memberName: 'Before' },
      { typeName: 'Flow', memberName: 'After' },
    ]);
  });

  it('treats a types block without members as contributing nothing', () => {
    const result = parseManifest(
      manifest(
        '<types><name>ApexClass</name></types><types><members>Home</members><name>ApexPage</name></types>'
      )
    );
    expect(result.components).toEqual([{ typeName: 'ApexPage', memberName: 'Home' }]);
  });

  it('preserves duplicate entries', () => {
    const result = parseManifest(
      manifest(
        '<types><members>Dup</members><members>Dup</members><name>ApexClass</name></types>' +
          '<types><members>Dup</members><name>ApexClass</name></types>'
      )
    );
    expect(result.components).toHaveLength(3);
    expect(new Set(result.components.map((c) => `${c.typeName}/${c.memberName}`))).toEqual(
      new Set(['ApexClass/Dup'])
    );
  });

  it('keeps member text as a string without numeric coercion', () => {
    const result = parseManifest(manifest('<types><members>007</members><name>Report</name></types>'));
    expect(result.components).toEqual([{ typeName: 'Report', memberName: '007' }]);
  });

  it('decodes entities and trims surrounding whitespace', () => {
    const result = parseManifest(
      manifest('<types>\n  <members>  R&amp;D Dashboard  </members>\n  <name> Dashboard </name>\n</types>')
    );
    expect(result.components).toEqual([{ typeName: 'Dashboard', memberName: 'R&D Dashboard' }]);
  });

  it('decodes decimal and hexadecimal character references', () => {
    const result = parseManifest(
      manifest('<types><members>R&#38;D&#x2C; Inc</members><name>Dashboard</name></types>')
    );
    expect(result.components).toEqual([{ typeName: 'Dashboard', memberName: 'R&D, Inc' }]);
  });

  it('does not decode a reference produced by an escaped ampersand', () => {
    const result = parseManifest(
      manifest('<types><members>A&amp;#x2C;B</members><name>Document</name></types>')
    );
    expect(result.components).toEqual([{ typeName: 'Document', memberName: 'A&#x2C;B' }]);
  });

  it('keeps an empty members element as a component with an empty name', () => {
    const result = parseManifest(
      manifest('<types><members/><members>Home</members><members></members><name>ApexPage</name></types>')
    );
    expect(result.components).toEqual([
      { typeName: 'ApexPage', memberName: '' },
      { typeName: 'ApexPage', memberName: 'Home' },
      { typeName: 'ApexPage', memberName: '' },
    ]);
  });

  it('ignores unknown root children', () => {
    const result = parseManifest(
      manifest('<fullName>my-changeset</fullName><types><members>X</members><name>ApexClass</name></types>')
    );
    expect(result.components).toEqual([{ typeName: 'ApexClass', memberName: 'X' }]);
  });

  it('matches prefixed element names by their local name', () => {
    const xml =
      `<md:Package xmlns:md="${MANIFEST_NAMESPACE}">` +
      '<md:types><md:members>Widget</md:members><md:name>ApexClass</md:name></md:types>' +
      '<md:version>58.0</md:version>' +
      '</md:Package>';
    const result = parseManifest(xml);
    expect(result.components).toEqual([{ typeName: 'ApexClass', memberName: 'Widget' }]);
    expect(result.version).toBe('58.0');
    expect(result.namespace).toBe(MANIFEST_NAMESPACE);
    expect(result.warnings).toEqual([]);
  });

  describe('advisory shape checks', () => {
    it('warns but parses when the namespace is missing', () => {
      const result = parseManifest(manifest('<types><members>A</members><name>ApexClass</name></types>', ''));
      expect(result.components).toEqual([{ typeName: 'ApexClass', memberName: 'A' }]);
      expect(result.namespace).toBeUndefined();
      expect(result.warnings).toEqual([
        `Root element declares no namespace, expected ${MANIFEST_NAMESPACE}`,
      ]);
    });

    it('warns but parses when the namespace differs', () => {
      const result = parseManifest(
        manifest('<types><members>A</members><name>ApexClass</name></types>', ' xmlns="urn:example"')
      );
      expect(result.components).toHaveLength(1);
      expect(result.warnings).toEqual([
        `Root element namespace is urn:example, expected ${MANIFEST_NAMESPACE}`,
      ]);
    });

    it('warns when the root element is not Package', () => {
      const result = parseManifest(
        `<Manifest xmlns="${MANIFEST_NAMESPACE}"><types><members>A</members><name>ApexClass</name></types></Manifest>`
      );
      expect(result.components).toEqual([{ typeName: 'ApexClass', memberName: 'A' }]);
      expect(result.warnings).toEqual(['Root element is <Manifest>, expected <Package>']);
    });
  });

  describe('errors', () => {
    it('fails with missing-type-name when a block has no name', () => {
      const error = parseError(manifest('<types><members>X</members></types>'));
      expect(error.kind).toBe('missing-type-name');
      expect(error.code).toBe(ErrorCode.MANIFEST_MISSING_TYPE_NAME);
      expect(error.blockIndex).toBe(0);
      expect(error.message).toBe('<types> block at index 0 has no <name>');
    });

    it('reports the index of the offending block', () => {
      const error = parseError(
        manifest(
          '<types><members>A</members><name>ApexClass</name></types>' +
            '<types><members>B</members></types>'
        )
      );
      expect(error.kind).toBe('missing-type-name');
      expect(error.blockIndex).toBe(1);
      expect(error.context['blockIndex']).toBe(1);
    });

    it('treats a blank name as missing', () => {
      const error = parseError(manifest('<types><members>X</members><name>   </name></types>'));
      expect(error.kind).toBe('missing-type-name');
    });

    it('treats an empty types element as missing its name', () => {
      const error = parseError(manifest('<types/>'));
      expect(error.kind).toBe('missing-type-name');
      expect(error.blockIndex).toBe(0);
    });

    it('rejects a block that declares two names', () => {
      const error = parseError(
        manifest('<types><members>X</members><name>ApexClass</name><name>ApexPage</name></types>')
      );
      expect(error.kind).toBe('duplicate-type-name');
      expect(error.code).toBe(ErrorCode.MANIFEST_DUPLICATE_TYPE_NAME);
      expect(error.blockIndex).toBe(0);
    });

    it('fails with malformed-xml on an unclosed tag', () => {
      const error = parseError('<Package>\n  <types>\n    <members>A</members>\n</Package>\n');
      expect(error.kind).toBe('malformed-xml');
      expect(error.code).toBe(ErrorCode.MANIFEST_MALFORMED_XML);
      expect(typeof error.line).toBe('number');
      expect(error.message).toMatch(/^Malformed XML \(line \d+, column \d+\): /);
    });

    it('fails with malformed-xml on an empty document', () => {
      const error = parseError('   \n');
      expect(error.kind).toBe('malformed-xml');
      expect(error.message).toBe('Malformed XML (line 1, column 1): document is empty');
    });

    it('fails with malformed-xml on plain text', () => {
      expect(parseError('not xml at all').kind).toBe('malformed-xml');
    });

    it('fails with malformed-xml on more than one root element', () => {
      expect(parseError('<Package></Package><Package></Package>').kind).toBe('malformed-xml');
    });
  });
});
