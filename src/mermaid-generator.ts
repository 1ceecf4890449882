/**
 * Generate Mermaid stateDiagram-v2 syntax from a state machine
 */

import type { State } from './state';
import type { StateMachine } from './state-machine';
import { HistoryType } from './types';

const INDENT = '    ';

/**
 * Mermaid identifier of a state: its dotted path with dots replaced
 */
export function mermaidId(state: State, prefix: string = ''): string {
  return toId(state.path, prefix);
}

function toId(path: string, prefix: string): string {
  return `${prefix}${path}`.replace(/[^A-Za-z0-9_]/g, '_');
}

/**
 * Every state of the machine, nested children and history states included
 */
export function collectStates(machine: StateMachine): State[] {
  const all: State[] = [];
  const visit = (state: State): void => {
    all.push(state);
    if (state.kind === 'composite') {
      state.getChildren().forEach(visit);
      const history = state.getHistory();
      if (history) all.push(history);
    }
  };
  machine.getStates().forEach(visit);
  return all;
}

/**
 * Generate Mermaid diagram for a state machine
 *
 * Composites become nested blocks, regions are separated by `--`, choice and
 * junction states use `<<choice>>`, history states are labelled [H] or [H*].
 */
export function generateMermaidDiagram(machine: StateMachine): string {
  const lines: string[] = ['stateDiagram-v2'];
  renderMachine(machine, '', INDENT, lines);
  return lines.join('\n');
}

function renderMachine(machine: StateMachine, prefix: string, indent: string, lines: string[]): void {
  const initial = machine.getInitialState();
  if (initial) {
    lines.push(`${indent}[*] --> ${mermaidId(initial, prefix)}`);
  }

  machine.getStates().forEach(state => renderState(state, prefix, indent, lines));

  machine.getTransitions().forEach(transition => {
    const from = toId(transition.from.path, prefix);
    lines.push(`${indent}${from} --> ${mermaidId(transition.to, prefix)}: ${transition.event}`);
  });

  for (const name of machine.getFinalStateNames()) {
    const state = machine.getState(name);
    if (state) {
      lines.push(`${indent}${mermaidId(state, prefix)} --> [*]`);
    }
  }
}

function declare(state: State, prefix: string, indent: string, lines: string[], label: string = state.name): string {
  const id = mermaidId(state, prefix);
  if (label !== id) {
    lines.push(`${indent}state "${label}" as ${id}`);
  }
  return id;
}

function renderState(state: State, prefix: string, indent: string, lines: string[]): void {
  const inner = indent + INDENT;
  switch (state.kind) {
    case 'composite': {
      const id = declare(state, prefix, indent, lines);
      lines.push(`${indent}state ${id} {`);
      const initial = state.getInitialChild();
      if (initial) {
        lines.push(`${inner}[*] --> ${mermaidId(initial, prefix)}`);
      }
      state.getChildren().forEach(child => renderState(child, prefix, inner, lines));
      const history = state.getHistory();
      if (history) {
        declare(history, prefix, inner, lines, history.historyType === HistoryType.DEEP ? '[H*]' : '[H]');
      }
      state.getInternalTransitions().forEach(transition => {
        const from = toId(transition.from.path, prefix);
        lines.push(`${inner}${from} --> ${mermaidId(transition.to, prefix)}: ${transition.event}`);
      });
      lines.push(`${indent}}`);
      return;
    }
    case 'parallel': {
      const id = declare(state, prefix, indent, lines);
      lines.push(`${indent}state ${id} {`);
      state.getRegions().forEach((region, index) => {
        if (index > 0) {
          lines.push(`${inner}--`);
        }
        renderMachine(region.engine, `${id}_${region.name}_`, inner, lines);
      });
      lines.push(`${indent}}`);
      const join = state.getJoinTarget();
      if (join) {
        lines.push(`${indent}${id} --> ${mermaidId(join, prefix)}: join`);
      }
      return;
    }
    case 'submachine': {
      const id = declare(state, prefix, indent, lines);
      lines.push(`${indent}state ${id} {`);
      renderMachine(state.submachine, `${id}_`, inner, lines);
      lines.push(`${indent}}`);
      return;
    }
    case 'choice':
    case 'junction': {
      const id = mermaidId(state, prefix);
      lines.push(`${indent}state ${id} <<choice>>`);
      if (state.kind === 'choice') {
        state.getChoices().forEach(option => lines.push(`${indent}${id} --> ${mermaidId(option.target, prefix)}`));
      } else {
        state.getPaths().forEach(path => lines.push(`${indent}${id} --> ${mermaidId(path.to, prefix)}`));
      }
      return;
    }
    case 'timeout': {
      const id = declare(state, prefix, indent, lines);
      const target = state.getTarget();
      if (target) {
        lines.push(`${indent}${id} --> ${mermaidId(target, prefix)}: ${state.timeoutEvent}`);
      }
      return;
    }
    case 'entryPoint':
    case 'exitPoint': {
      const id = declare(state, prefix, indent, lines);
      const target = state.getTarget();
      if (target) {
        lines.push(`${indent}${id} --> ${mermaidId(target, prefix)}`);
      }
      return;
    }
    default:
      declare(state, prefix, indent, lines);
  }
}

/**
 * Successors of a state in the static topology
 */
function successors(machine: StateMachine, state: State): State[] {
  const next: State[] = machine
    .getTransitions()
    .filter(transition => transition.from === state)
    .map(transition => transition.to);

  switch (state.kind) {
    case 'composite': {
      const initial = state.getInitialChild();
      if (initial) next.push(initial);
      break;
    }
    case 'parallel': {
      const join = state.getJoinTarget();
      if (join) next.push(join);
      break;
    }
    case 'choice':
      state.getChoices().forEach(option => next.push(option.target));
      break;
    case 'junction':
      state.getPaths().forEach(path => next.push(path.to));
      break;
    case 'history': {
      if (state.owner) next.push(state.owner);
      const fallback = state.getDefaultState();
      if (fallback) next.push(fallback);
      break;
    }
    case 'timeout':
    case 'entryPoint':
    case 'exitPoint': {
      const target = state.getTarget();
      if (target) next.push(target);
      break;
    }
    default:
      break;
  }

  const siblingTransitions = state.parent?.getInternalTransitions() ?? [];
  siblingTransitions.filter(transition => transition.from === state).forEach(transition => next.push(transition.to));
  return next;
}

/**
 * Compute reachable state paths from a state using BFS
 */
export function computeReachableStates(machine: StateMachine, fromPath: string): Set<string> {
  const reachable = new Set<string>();
  const start = collectStates(machine).find(state => state.path === fromPath);
  if (!start) return reachable;

  const queue: State[] = [start];
  reachable.add(start.path);
  while (queue.length > 0) {
    const state = queue.shift();
    if (!state) break;
    for (const next of successors(machine, state)) {
      if (!reachable.has(next.path)) {
        reachable.add(next.path);
        queue.push(next);
      }
    }
  }
  return reachable;
}
