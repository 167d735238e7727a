import { describe, expect, it } from 'vitest';
import { readConfiguration } from '../../../src/graph/configuration.js';
import { DefaultsResolver } from '../../../src/graph/defaults-resolver.js';
import { getChild, getChildren } from '../../../src/markup/element.js';
import type { Element } from '../../../src/markup/element.js';
import { parseMarkup } from '../../../src/markup/xml.js';
import { createActionRegistry } from '../../../src/registry/action-registry.js';
import { ErrorCode } from '../../../src/types/errors.js';
import type { GlobalDefaults } from '../../../src/types/workflow.js';
import { catchWorkflowError } from '../../helpers/graphs.js';

const registry = createActionRegistry();

function childNames(element: Element): string[] {
  return element.children.map((c) => c.name);
}

function globals(overrides: Partial<GlobalDefaults> = {}): GlobalDefaults {
  return { jobXmls: [], ...overrides };
}

describe('DefaultsResolver endpoints', () => {
  it('keeps a local name-node and fills the job-tracker from globals', () => {
    const element = parseMarkup('<map-reduce><name-node>hdfs://local</name-node></map-reduce>');
    new DefaultsResolver(registry).resolve(element, globals({ nameNode: 'hdfs://global', jobTracker: 'jt-global' }));
    expect(getChildren(element, 'name-node').map((e) => e.text)).toEqual(['hdfs://local']);
    expect(getChild(element, 'job-tracker')?.text).toBe('jt-global');
  });

  it('prefers globals over site defaults', () => {
    const element = parseMarkup('<pig/>');
    const resolver = new DefaultsResolver(registry, { nameNode: 'hdfs://site', jobTracker: 'jt-site' });
    resolver.resolve(element, globals({ nameNode: 'hdfs://global' }));
    expect(getChild(element, 'name-node')?.text).toBe('hdfs://global');
    expect(getChild(element, 'job-tracker')?.text).toBe('jt-site');
  });

  it('falls back to trimmed site defaults', () => {
    const element = parseMarkup('<hive/>');
    const resolver = new DefaultsResolver(registry, { nameNode: '  hdfs://site  ', jobTracker: 'jt-site' });
    resolver.resolve(element, undefined);
    expect(getChild(element, 'name-node')?.text).toBe('hdfs://site');
  });

  it('treats a blank site default as unset', () => {
    const element = parseMarkup('<hive/>');
    const resolver = new DefaultsResolver(registry, { nameNode: '   ', jobTracker: 'jt-site' });
    const error = catchWorkflowError(() => resolver.resolve(element, undefined));
    expect(error.code).toBe(ErrorCode.MISSING_REQUIRED_DEFAULT);
    expect(error.message).toBe('No name-node defined for action type [hive]');
  });

  it('fails when an action type requiring endpoints gets none', () => {
    const element = parseMarkup('<map-reduce/>');
    const error = catchWorkflowError(() => new DefaultsResolver(registry).resolve(element, undefined));
    expect(error.code).toBe(ErrorCode.MISSING_REQUIRED_DEFAULT);
  });

  it('never fails for sub-workflow actions', () => {
    const element = parseMarkup('<sub-workflow><app-path>child</app-path></sub-workflow>');
    new DefaultsResolver(registry).resolve(element, undefined);
    expect(childNames(element)).toEqual(['app-path']);
  });

  it('gives fs actions a name-node only', () => {
    const element = parseMarkup('<fs><mkdir path="/tmp/out"/></fs>');
    new DefaultsResolver(registry, { nameNode: 'hdfs://site', jobTracker: 'jt-site' }).resolve(element, undefined);
    expect(childNames(element)).toEqual(['mkdir', 'name-node', 'configuration']);
  });

  it('rejects an unknown action type', () => {
    const element = parseMarkup('<teleport/>');
    const error = catchWorkflowError(() => new DefaultsResolver(registry).resolve(element, undefined));
    expect(error.code).toBe(ErrorCode.UNSUPPORTED_ACTION_TYPE);
    expect(error.message).toBe('Action type [teleport] is not supported');
  });

  it('leaves action types without endpoint or configuration support untouched', () => {
    const element = parseMarkup('<email><to>ops@example.com</to></email>');
    new DefaultsResolver(registry, { nameNode: 'hdfs://site' }).resolve(element, globals({ nameNode: 'hdfs://g' }));
    expect(childNames(element)).toEqual(['to']);
  });
});

describe('DefaultsResolver configuration', () => {
  const site = { nameNode: 'hdfs://site', jobTracker: 'jt-site' };

  it('merges site, global and local configuration in that order', () => {
    const element = parseMarkup(`
      <java>
        <configuration>
          <property><name>c</name><value>local</value></property>
          <property><name>d</name><value>local</value></property>
        </configuration>
        <main-class>org.example.Main</main-class>
      </java>`);
    const siteConfiguration = new Map([
      ['a', 'site'],
      ['b', 'site'],
    ]);
    const inherited = globals({
      configuration: new Map([
        ['b', 'global'],
        ['c', 'global'],
      ]),
    });
    new DefaultsResolver(registry, site).resolve(element, inherited, siteConfiguration);

    expect(childNames(element)).toEqual(['configuration', 'main-class', 'name-node', 'job-tracker']);
    const configuration = getChild(element, 'configuration');
    expect(configuration && [...readConfiguration(configuration)]).toEqual([
      ['a', 'site'],
      ['b', 'global'],
      ['c', 'local'],
      ['d', 'local'],
    ]);
  });

  it('appends a configuration element when the action has none', () => {
    const element = parseMarkup('<shell><exec>run.sh</exec></shell>');
    new DefaultsResolver(registry, site).resolve(element, globals({ configuration: new Map([['q', 'v']]) }));
    const configuration = getChild(element, 'configuration');
    expect(configuration && [...readConfiguration(configuration)]).toEqual([['q', 'v']]);
  });

  it('appends global job-xml entries missing locally, once each', () => {
    const element = parseMarkup('<spark><job-xml>a.xml</job-xml><job-xml>b.xml</job-xml></spark>');
    new DefaultsResolver(registry, site).resolve(element, globals({ jobXmls: ['b.xml', 'c.xml', 'c.xml'] }));
    expect(getChildren(element, 'job-xml').map((e) => e.text)).toEqual(['a.xml', 'b.xml', 'c.xml']);
  });

  it('resolves the global section without requiring endpoints', () => {
    const element = parseMarkup('<global><job-xml>own.xml</job-xml></global>');
    new DefaultsResolver(registry).resolve(element, globals({ nameNode: 'hdfs://parent', jobXmls: ['parent.xml'] }));
    expect(childNames(element)).toEqual(['job-xml', 'name-node', 'job-xml', 'configuration']);
    expect(getChild(element, 'name-node')?.text).toBe('hdfs://parent');
  });
});
