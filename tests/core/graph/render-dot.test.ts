import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { intDescriptor, stringDescriptor } from '../../../src/core/keys/descriptor.js';
import { EvalContext } from '../../../src/core/keys/eval-context.js';
import { KeyRegistry } from '../../../src/core/keys/key-registry.js';
import { GraphBuilder } from '../../../src/core/graph/graph-builder.js';
import { evaluateGraph } from '../../../src/core/graph/evaluate.js';
import { renderDot } from '../../../src/core/graph/render-dot.js';

describe('renderDot', () => {
  it('draws each kind of node and edge in its own style', () => {
    const builder = new GraphBuilder();
    const consoleNode = builder.addVertex({ name: 'console' });
    const http = builder.addConfigurable({ name: 'http', moduleName: 'Http', args: [consoleNode] });
    const main = builder.addConfigurable({ name: 'main', moduleName: 'Main.start' });
    builder.addDataDependency(main, http);
    builder.addApp({ base: main, args: [http] });

    assert.equal(
      renderDot(builder.build()),
      [
        'digraph keygraph {',
        '  node [fontname="monospace"];',
        '  n0 [label="console", shape=circle];',
        '  n1 [label="http\\nHttp", shape=box];',
        '  n2 [label="main\\nMain.start", shape=box];',
        '  n3 [label="app", shape=diamond];',
        '  n1 -> n0 [style=solid, label="1"];',
        '  n2 -> n1 [style=dashed];',
        '  n3 -> n2 [style=bold];',
        '  n3 -> n1 [style=solid, label="1"];',
        '}',
        ''
      ].join('\n')
    );
  });

  it('lists the values an evaluation resolved', () => {
    const registry = new KeyRegistry();
    const logLevel = registry.create('log_level', stringDescriptor, { defaultValue: 'info' });
    const port = registry.create('port', intDescriptor, { defaultValue: 8080, stage: 'configure' });
    const builder = new GraphBuilder();
    builder.addConfigurable({ name: 'http', moduleName: 'Http', keys: [logLevel, port] });
    const graph = builder.build();

    const ctx = new EvalContext();
    ctx.bind(logLevel, 'say "debug"');
    const partial = renderDot(graph, evaluateGraph(graph, ctx, 'partial'));

    assert.equal(partial.split('\n')[2], '  n0 [label="http\\nHttp\\nlog_level=say \\"debug\\"", shape=box];');
  });

  it('leaves the module out of the label when it matches the name', () => {
    const builder = new GraphBuilder();
    builder.addConfigurable({ name: 'Http' });
    assert.equal(renderDot(builder.build()).split('\n')[2], '  n0 [label="Http", shape=box];');
  });
});
