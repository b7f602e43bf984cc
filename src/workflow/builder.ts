import type { LlmConfig } from '../bridges/capabilities.js';
import { GraphStructureError, PredicateError, SchemaBuildError } from './errors.js';
import { buildOutputModel, SIMPLE_OUTPUT_FIELD, type OutputModel } from './output.js';
import { parsePredicate, type Predicate } from './predicate.js';
import {
  END,
  parseWorkflowSpec,
  START,
  type EdgeDeclaration,
  type GateDeclaration,
  type LlmConfigDeclaration,
  type NodeDeclaration,
  type ParallelDeclaration,
  type SandboxConfigDeclaration,
  type WorkflowSpec,
} from './schema.js';
import { StateModel } from './state.js';
import { closestMatch } from './suggest.js';
import { extractVariables, stripStatePrefix } from './template.js';
import { describeType, isAssignable, type TypeDescriptor } from './type-descriptor.js';

export type JoinMode = 'all_settled' | 'all_or_nothing';

export interface ToolBinding {
  name: string;
  onError: 'fail' | 'continue';
}

export interface CompiledNode {
  id: string;
  description?: string;
  inputs: Record<string, string>;
  prompt?: string;
  code?: string;
  outputs: string[];
  outputModel: OutputModel;
  tools: ToolBinding[];
  llm: Partial<LlmConfig>;
  sandbox?: SandboxConfigDeclaration;
  maxAttempts?: number;
  /** Set on nodes a map edge runs once per item; each result goes into this list field. */
  collectInto?: string;
}

export type CompiledEdge =
  | { kind: 'linear'; from: string; to: string }
  | { kind: 'conditional'; from: string; routes: { predicate: Predicate; to: string }[]; defaultTo: string }
  | { kind: 'loop'; from: string; target: string; maxIterations: number; until: Predicate; exitTo: string }
  | { kind: 'parallel'; from: string; targets: string[]; join: string; joinMode: JoinMode }
  | {
      kind: 'map';
      from: string;
      itemsField: string;
      target: string;
      collectField: string;
      join: string;
      joinMode: JoinMode;
    };

/** Names a mapped node can read beside its own inputs. */
export const MAPPED_INPUTS: readonly string[] = ['item', 'index'];

type MapDeclaration = Extract<ParallelDeclaration, { items_field: string }>;

interface MappedTarget {
  from: string;
  itemsField: string;
  collectField: string;
}

export interface CompiledGraph {
  name: string;
  spec: WorkflowSpec;
  stateModel: StateModel;
  nodes: ReadonlyMap<string, CompiledNode>;
  /** Outgoing edge per source; START is a source too. */
  edges: ReadonlyMap<string, CompiledEdge>;
  /** Nodes that sit on the body of a declared loop. */
  loopNodes: ReadonlySet<string>;
  llmDefaults: Partial<LlmConfig>;
  execution: { timeoutMs?: number; maxRetries?: number };
  gates?: { gates: GateDeclaration[]; onFail: 'warn' | 'fail' };
}

export function toLlmConfig(declaration: LlmConfigDeclaration | undefined): Partial<LlmConfig> {
  if (!declaration) return {};
  const config: Partial<LlmConfig> = {};
  if (declaration.provider !== undefined) config.provider = declaration.provider;
  if (declaration.model !== undefined) config.model = declaration.model;
  if (declaration.temperature !== undefined) config.temperature = declaration.temperature;
  if (declaration.max_tokens !== undefined) config.maxTokens = declaration.max_tokens;
  if (declaration.api_base !== undefined) config.apiBase = declaration.api_base;
  return config;
}

export function successorsOf(edge: CompiledEdge): string[] {
  switch (edge.kind) {
    case 'linear':
      return [edge.to];
    case 'conditional':
      return [...edge.routes.map((route) => route.to), edge.defaultTo];
    case 'loop':
      return [edge.target, edge.exitTo];
    case 'parallel':
      return [...edge.targets, edge.join];
    case 'map':
      return [edge.target, edge.join];
  }
}

function didYouMean(name: string, candidates: Iterable<string>): string | undefined {
  const match = closestMatch(name, candidates);
  return match ? `Did you mean '${match}'?` : undefined;
}

/**
 * Turns a workflow document into a validated executable graph. All structural
 * checks happen here so that nothing structural can fail mid-run.
 */
export class GraphCompiler {
  private readonly nodes = new Map<string, CompiledNode>();
  private readonly edges = new Map<string, CompiledEdge>();
  private readonly stateModel: StateModel;
  private readonly mapped = new Map<string, MappedTarget>();

  private constructor(private readonly spec: WorkflowSpec) {
    this.stateModel = StateModel.build(spec.state.fields);
  }

  static compile(document: unknown): CompiledGraph {
    const spec = parseWorkflowSpec(document);
    return new GraphCompiler(spec).build();
  }

  private build(): CompiledGraph {
    for (const edge of this.spec.edges) {
      const parallel = edge.parallel;
      if (parallel === undefined || !('items_field' in parallel)) continue;
      if (this.mapped.has(parallel.target)) {
        throw new GraphStructureError(`Node '${parallel.target}' is the target of more than one map edge`);
      }
      this.mapped.set(parallel.target, {
        from: edge.from,
        itemsField: parallel.items_field,
        collectField: parallel.collect_field,
      });
    }

    for (const declaration of this.spec.nodes) {
      this.nodes.set(declaration.id, this.compileNode(declaration));
    }

    const startEdges = this.spec.edges.filter((edge) => edge.from === START);
    if (startEdges.length !== 1) {
      throw new GraphStructureError(`Workflow must have exactly one edge from START, found ${startEdges.length}`);
    }

    for (const declaration of this.spec.edges) {
      const edge = this.compileEdge(declaration);
      if (this.edges.has(edge.from)) {
        throw new GraphStructureError(`Node '${edge.from}' has more than one outgoing edge`);
      }
      this.edges.set(edge.from, edge);
    }

    this.addImplicitJoinEdges();
    this.checkMappedEntries();
    this.checkReachability();
    this.checkCycles();
    this.checkParallelBranches();

    const config = this.spec.config;
    return Object.freeze({
      name: this.spec.flow.name,
      spec: this.spec,
      stateModel: this.stateModel,
      nodes: this.nodes,
      edges: this.edges,
      loopNodes: this.collectLoopNodes(),
      llmDefaults: toLlmConfig(config?.llm),
      execution: {
        timeoutMs: config?.execution ? config.execution.timeout * 1000 : undefined,
        maxRetries: config?.execution?.max_retries,
      },
      gates: config?.gates ? { gates: config.gates.gates, onFail: config.gates.on_fail } : undefined,
    });
  }

  private compileNode(declaration: NodeDeclaration): CompiledNode {
    const outputModel = buildOutputModel(declaration.id, declaration.output_schema);
    const inputs = declaration.inputs ?? {};
    const mapped = this.mapped.get(declaration.id);

    if (mapped) {
      if (declaration.outputs.length > 0) {
        throw new GraphStructureError(
          `Node '${declaration.id}' runs once per item of '${mapped.itemsField}' and collects into '${mapped.collectField}', so it cannot declare outputs`,
        );
      }
      this.checkCollectField(declaration.id, outputModel, mapped.collectField);
    } else if (declaration.outputs.length === 0) {
      throw new GraphStructureError(`Node '${declaration.id}' must declare at least one output field`);
    }

    for (const output of declaration.outputs) {
      const field = this.stateModel.field(output);
      if (!field) {
        throw new GraphStructureError(
          `Node '${declaration.id}' writes unknown state field '${output}'`,
          didYouMean(output, this.stateModel.fieldNames()),
        );
      }
      const produced =
        outputModel.kind === 'simple'
          ? outputModel.fields[0]
          : outputModel.fields.find((candidate) => candidate.name === output);
      if (!produced) {
        throw new GraphStructureError(
          `Node '${declaration.id}' lists output '${output}' that its output_schema does not declare`,
          didYouMean(output, outputModel.fields.map((candidate) => candidate.name)),
        );
      }
      if (!isAssignable(produced.type, field.type)) {
        throw new SchemaBuildError(
          `Node '${declaration.id}' output '${output}' has type ${describeType(produced.type)} but state field is ${describeType(field.type)}`,
          output,
        );
      }
    }
    if (!mapped && outputModel.kind === 'simple' && declaration.outputs.length !== 1) {
      throw new GraphStructureError(
        `Node '${declaration.id}' has a single '${SIMPLE_OUTPUT_FIELD}' output but lists ${declaration.outputs.length} output fields`,
      );
    }

    for (const template of Object.values(inputs)) {
      for (const variable of extractVariables(template)) {
        this.requireStatePath(declaration.id, stripStatePrefix(variable));
      }
    }
    for (const variable of extractVariables(declaration.prompt ?? '')) {
      const head = variable.split('.')[0] ?? variable;
      const local = Object.hasOwn(inputs, head) || (mapped !== undefined && MAPPED_INPUTS.includes(head));
      if (!variable.startsWith('state.') && local) {
        continue;
      }
      this.requireStatePath(declaration.id, stripStatePrefix(variable), [
        ...Object.keys(inputs),
        ...(mapped ? MAPPED_INPUTS : []),
      ]);
    }

    return {
      id: declaration.id,
      description: declaration.description,
      inputs,
      prompt: declaration.prompt,
      code: declaration.code,
      outputs: declaration.outputs,
      outputModel,
      tools: (declaration.tools ?? []).map((tool): ToolBinding =>
        typeof tool === 'string' ? { name: tool, onError: 'fail' } : { name: tool.name, onError: tool.on_error },
      ),
      llm: toLlmConfig(declaration.llm),
      sandbox: declaration.sandbox,
      maxAttempts: declaration.retry?.max_attempts,
      ...(mapped ? { collectInto: mapped.collectField } : {}),
    };
  }

  private checkCollectField(nodeId: string, outputModel: OutputModel, collectField: string): void {
    const field = this.stateModel.field(collectField);
    if (!field) {
      throw new GraphStructureError(
        `Map edge into '${nodeId}' collects into unknown state field '${collectField}'`,
        didYouMean(collectField, this.stateModel.fieldNames()),
      );
    }
    if (field.type.kind !== 'list') {
      throw new GraphStructureError(
        `collect_field '${collectField}' must be a list, not ${describeType(field.type)}`,
      );
    }
    const element = field.type.element;
    const [single] = outputModel.fields;
    const produced: TypeDescriptor = outputModel.kind === 'simple' && single ? single.type : { kind: 'dict' };
    if (element && !isAssignable(produced, element)) {
      throw new SchemaBuildError(
        `Node '${nodeId}' produces ${describeType(produced)} but collect_field '${collectField}' holds ${describeType(element)}`,
        collectField,
      );
    }
  }

  private requireStatePath(nodeId: string, path: string, extraCandidates: string[] = []): void {
    if (this.stateModel.lookup(path).found) {
      return;
    }
    throw new GraphStructureError(
      `Node '${nodeId}' references unknown variable '${path}'`,
      didYouMean(path, [...extraCandidates, ...this.stateModel.paths()]),
    );
  }

  private requireNode(from: string, id: string, allowEnd: boolean): void {
    if (id === END && allowEnd) return;
    if (id === END || id === START) {
      throw new GraphStructureError(`Edge from '${from}' cannot target ${id} here`);
    }
    if (!this.nodes.has(id)) {
      throw new GraphStructureError(
        `Edge from '${from}' targets unknown node '${id}'`,
        didYouMean(id, this.nodes.keys()),
      );
    }
  }

  private compilePredicate(from: string, source: string): Predicate {
    let predicate: Predicate;
    try {
      predicate = parsePredicate(source);
    } catch (error) {
      if (error instanceof PredicateError) {
        throw new GraphStructureError(`Invalid condition on edge from '${from}': ${error.message}`);
      }
      throw error;
    }
    for (const path of predicate.paths) {
      if (!this.stateModel.lookup(path).found) {
        throw new GraphStructureError(
          `Condition on edge from '${from}' references unknown state field '${path}'`,
          didYouMean(path, this.stateModel.paths()),
        );
      }
    }
    return predicate;
  }

  private compileEdge(declaration: EdgeDeclaration): CompiledEdge {
    const from = declaration.from;
    if (from !== START && !this.nodes.has(from)) {
      throw new GraphStructureError(
        `Edge source '${from}' is not a declared node`,
        didYouMean(from, [START, ...this.nodes.keys()]),
      );
    }

    if (declaration.to !== undefined) {
      this.requireNode(from, declaration.to, true);
      return { kind: 'linear', from, to: declaration.to };
    }

    if (declaration.routes !== undefined) {
      const defaults = declaration.routes.filter((route) => route.condition.logic.trim().toLowerCase() === 'default');
      if (defaults.length === 0) {
        throw new GraphStructureError(`Conditional routes from '${from}' must have a default route`);
      }
      const [fallback] = defaults;
      if (defaults.length > 1 || !fallback) {
        throw new GraphStructureError(`Conditional routes from '${from}' declare more than one default route`);
      }
      const routes = declaration.routes
        .filter((route) => route !== fallback)
        .map((route) => {
          this.requireNode(from, route.to, true);
          return { predicate: this.compilePredicate(from, route.condition.logic), to: route.to };
        });
      this.requireNode(from, fallback.to, true);
      return { kind: 'conditional', from, routes, defaultTo: fallback.to };
    }

    if (declaration.loop !== undefined) {
      const loop = declaration.loop;
      if (from === START) {
        throw new GraphStructureError('A loop edge cannot start at START');
      }
      const target = loop.target ?? from;
      this.requireNode(from, target, false);
      this.requireNode(from, loop.exit_to, true);

      let until: Predicate;
      if (loop.condition_field !== undefined) {
        const field = this.stateModel.field(loop.condition_field);
        if (!field) {
          throw new GraphStructureError(
            `Loop on '${from}' uses unknown condition_field '${loop.condition_field}'`,
            didYouMean(loop.condition_field, this.stateModel.fieldNames()),
          );
        }
        if (field.type.kind !== 'bool') {
          throw new GraphStructureError(
            `Loop on '${from}' condition_field '${loop.condition_field}' must be bool, not ${describeType(field.type)}`,
          );
        }
        until = parsePredicate(`${loop.condition_field} == true`);
      } else {
        until = this.compilePredicate(from, loop.until ?? '');
      }
      return { kind: 'loop', from, target, maxIterations: loop.max_iterations, until, exitTo: loop.exit_to };
    }

    if (declaration.parallel !== undefined) {
      const parallel = declaration.parallel;
      if ('items_field' in parallel) {
        return this.compileMapEdge(from, parallel);
      }
      if (new Set(parallel.targets).size !== parallel.targets.length) {
        throw new GraphStructureError(`Parallel edge from '${from}' lists a target more than once`);
      }
      for (const target of parallel.targets) {
        this.requireNode(from, target, false);
      }
      this.requireNode(from, parallel.join, false);
      if (parallel.targets.includes(parallel.join)) {
        throw new GraphStructureError(`Parallel edge from '${from}' uses join '${parallel.join}' as a branch target`);
      }
      return {
        kind: 'parallel',
        from,
        targets: parallel.targets,
        join: parallel.join,
        joinMode: parallel.join_mode,
      };
    }

    throw new GraphStructureError(`Edge from '${from}' declares no transition`);
  }

  private compileMapEdge(from: string, map: MapDeclaration): CompiledEdge {
    this.requireNode(from, map.target, false);
    this.requireNode(from, map.join, false);
    if (map.target === map.join) {
      throw new GraphStructureError(`Map edge from '${from}' uses join '${map.join}' as its target`);
    }
    const items = this.stateModel.field(map.items_field);
    if (!items) {
      throw new GraphStructureError(
        `Map edge from '${from}' reads unknown items_field '${map.items_field}'`,
        didYouMean(map.items_field, this.stateModel.fieldNames()),
      );
    }
    if (items.type.kind !== 'list') {
      throw new GraphStructureError(
        `items_field '${map.items_field}' must be a list, not ${describeType(items.type)}`,
      );
    }
    return {
      kind: 'map',
      from,
      itemsField: map.items_field,
      target: map.target,
      collectField: map.collect_field,
      join: map.join,
      joinMode: map.join_mode,
    };
  }

  /** Branch targets without an edge of their own flow into the join. */
  private addImplicitJoinEdges(): void {
    for (const edge of [...this.edges.values()]) {
      if (edge.kind === 'map') {
        if (this.edges.has(edge.target)) {
          throw new GraphStructureError(
            `Mapped node '${edge.target}' cannot declare its own outgoing edge`,
            `Its results always flow into join '${edge.join}'`,
          );
        }
        this.edges.set(edge.target, { kind: 'linear', from: edge.target, to: edge.join });
        continue;
      }
      if (edge.kind !== 'parallel') continue;
      for (const target of edge.targets) {
        if (!this.edges.has(target)) {
          this.edges.set(target, { kind: 'linear', from: target, to: edge.join });
        }
      }
    }
  }

  private checkMappedEntries(): void {
    for (const edge of this.edges.values()) {
      for (const next of successorsOf(edge)) {
        const mapped = this.mapped.get(next);
        if (mapped && !(edge.kind === 'map' && edge.target === next)) {
          throw new GraphStructureError(
            `Node '${next}' runs once per item of '${mapped.itemsField}' and can only be entered from its map edge`,
          );
        }
      }
    }
  }

  private successors(id: string, includeLoopBacks = true): string[] {
    const edge = this.edges.get(id);
    if (!edge) return [];
    if (edge.kind === 'loop' && !includeLoopBacks) {
      return [edge.exitTo];
    }
    return successorsOf(edge);
  }

  private checkReachability(): void {
    const reached = new Set<string>([START]);
    const queue = [START];
    while (queue.length > 0) {
      const current = queue.shift() ?? START;
      for (const next of this.successors(current)) {
        if (!reached.has(next)) {
          reached.add(next);
          queue.push(next);
        }
      }
    }
    const unreachable = [...this.nodes.keys()].filter((id) => !reached.has(id));
    if (unreachable.length > 0) {
      throw new GraphStructureError(`Nodes not reachable from START: [${unreachable.join(', ')}]`);
    }

    const canFinish = new Set<string>([END]);
    let changed = true;
    while (changed) {
      changed = false;
      for (const id of this.nodes.keys()) {
        if (!canFinish.has(id) && this.successors(id).some((next) => canFinish.has(next))) {
          canFinish.add(id);
          changed = true;
        }
      }
    }
    const stuck = [...this.nodes.keys()].filter((id) => !canFinish.has(id));
    if (stuck.length > 0) {
      throw new GraphStructureError(
        `Nodes cannot reach END: [${stuck.join(', ')}]`,
        'Add an edge to END or to a node that reaches END',
      );
    }
  }

  private checkCycles(): void {
    const visited = new Set<string>();
    const active = new Set<string>();

    const visit = (id: string): void => {
      if (id === END) return;
      if (active.has(id)) {
        throw new GraphStructureError(
          `Cycle detected in graph at node: ${id}`,
          'Declare intentional repetition with a loop edge',
        );
      }
      if (visited.has(id)) return;
      active.add(id);
      for (const next of this.successors(id, false)) {
        visit(next);
      }
      active.delete(id);
      visited.add(id);
    };

    visit(START);
  }

  /** Nodes reachable from `start` without passing through `stop`. */
  private branchNodes(start: string, stop: string): Set<string> {
    const seen = new Set<string>();
    const stack = [start];
    while (stack.length > 0) {
      const current = stack.pop() ?? stop;
      if (current === stop || seen.has(current)) continue;
      if (current === END) {
        throw new GraphStructureError(`Parallel branch '${start}' reaches END before join '${stop}'`);
      }
      seen.add(current);
      stack.push(...this.successors(current));
    }
    return seen;
  }

  private checkParallelBranches(): void {
    for (const edge of this.edges.values()) {
      if (edge.kind !== 'parallel') continue;

      const writes = edge.targets.map((target) => {
        const fields = new Set<string>();
        for (const id of this.branchNodes(target, edge.join)) {
          const node = this.nodes.get(id);
          for (const output of node?.outputs ?? []) {
            fields.add(output);
          }
          if (node?.collectInto !== undefined) {
            fields.add(node.collectInto);
          }
        }
        return { target, fields };
      });

      for (let i = 0; i < writes.length; i++) {
        for (let j = i + 1; j < writes.length; j++) {
          const left = writes[i];
          const right = writes[j];
          if (!left || !right) continue;
          const shared = [...left.fields].filter((field) => right.fields.has(field));
          if (shared.length > 0) {
            throw new GraphStructureError(
              `Parallel branches '${left.target}' and '${right.target}' from '${edge.from}' both write [${shared.join(', ')}]`,
              'Give each branch its own output fields and combine them in the join node',
            );
          }
        }
      }
    }
  }

  private collectLoopNodes(): Set<string> {
    const loopNodes = new Set<string>();
    for (const edge of this.edges.values()) {
      if (edge.kind !== 'loop') continue;

      const forward = new Set<string>();
      const stack = [edge.target];
      while (stack.length > 0) {
        const current = stack.pop() ?? END;
        if (current === END || forward.has(current)) continue;
        forward.add(current);
        if (current !== edge.from) {
          stack.push(...this.successors(current, false));
        }
      }

      for (const id of forward) {
        if (id === edge.from || this.reaches(id, edge.from)) {
          loopNodes.add(id);
        }
      }
    }
    return loopNodes;
  }

  private reaches(from: string, to: string): boolean {
    const seen = new Set<string>();
    const stack = [from];
    while (stack.length > 0) {
      const current = stack.pop() ?? END;
      if (current === to) return true;
      if (current === END || seen.has(current)) continue;
      seen.add(current);
      stack.push(...this.successors(current, false));
    }
    return false;
  }
}

export function compileWorkflow(document: unknown): CompiledGraph {
  return GraphCompiler.compile(document);
}

/** Mermaid flowchart of the compiled graph, for `flowgraph graph`. */
export function renderMermaid(graph: CompiledGraph): string {
  const lines = ['flowchart TD'];
  for (const edge of graph.edges.values()) {
    switch (edge.kind) {
      case 'linear':
        lines.push(`  ${edge.from} --> ${edge.to}`);
        break;
      case 'conditional':
        for (const route of edge.routes) {
          lines.push(`  ${edge.from} -->|${route.predicate.source.replace(/"/g, "'")}| ${route.to}`);
        }
        lines.push(`  ${edge.from} -->|default| ${edge.defaultTo}`);
        break;
      case 'loop':
        lines.push(`  ${edge.from} -.->|repeat max ${edge.maxIterations}| ${edge.target}`);
        lines.push(`  ${edge.from} -->|exit| ${edge.exitTo}`);
        break;
      case 'parallel':
        for (const target of edge.targets) {
          lines.push(`  ${edge.from} ==> ${target}`);
        }
        break;
      case 'map':
        lines.push(`  ${edge.from} ==>|each ${edge.itemsField}| ${edge.target}`);
        break;
    }
  }
  return lines.join('\n');
}
