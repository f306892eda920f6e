import { valueAndDerivative } from '../Derivatives';
import { minimize } from '../GradientDescent';
import { assert } from './cli-error';
import { sampleFunctions, sampleObjectives } from './functions';
import type { DeriveArgs, MinimizeArgs } from './options';

const fmt = (n: number) => Number(n.toPrecision(12)).toString();

export function runList(): string[] {
  const lines = ['functions (derive):'];
  for (const [name, { formula }] of Object.entries(sampleFunctions)) {
    lines.push(`  ${name.padEnd(16)} ${formula}`);
  }
  lines.push('objectives (minimize):');
  for (const [name, { formula }] of Object.entries(sampleObjectives)) {
    lines.push(`  ${name.padEnd(16)} ${formula}`);
  }
  return lines;
}

export function runDerive(args: DeriveArgs): string[] {
  const sample = sampleFunctions[args.fn];
  assert(sample, `Unknown function "${args.fn}"`);
  const { value, derivative } = valueAndDerivative(sample.fn, args.at);
  return [
    `f(x) = ${sample.formula}`,
    `f(${fmt(args.at)}) = ${fmt(value)}`,
    `df/dx = ${fmt(derivative)}`,
  ];
}

export function runMinimize(args: MinimizeArgs): string[] {
  const objective = sampleObjectives[args.fn];
  assert(objective, `Unknown objective "${args.fn}"`);
  assert(
    args.start.length === objective.arity,
    `${args.fn} takes ${objective.arity} coordinates, got ${args.start.length}`
  );

  const result = minimize(objective.fn, args.start, {
    learningRate: args.learningRate,
    tolerance: args.tolerance,
    maxIterations: args.maxIterations,
    verbose: args.verbose,
  });

  return [
    `f = ${objective.formula}`,
    `${result.convergenceReason} after ${result.iterations} iterations`,
    `minimum at [${result.point.map(fmt).join(', ')}]`,
    `f = ${fmt(result.value)}`,
    ...result.gradient.map((g, i) => `df/dx${i} = ${fmt(g)}`),
  ];
}
