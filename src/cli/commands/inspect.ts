/**
 * `cliff-knapsack inspect [instance]` — Load an instance and describe it.
 */

import { Command } from 'commander';
import type { Knapsack } from '../../knapsack/knapsack.js';
import { loadKnapsack } from '../../knapsack/loader.js';
import { prepareCommand, resolveInstancePath, type CommonOptions } from '../setup.js';

interface InspectOptions extends CommonOptions {
  json?: boolean;
}

export interface InstanceSummary {
  path: string;
  numItems: number;
  capacity: number;
  totalValue: number;
  totalWeight: number;
  items: { id: number; value: number; weight: number }[];
}

export function createInspectCommand(): Command {
  const cmd = new Command('inspect');

  cmd
    .description('Load a knapsack instance and show its items and capacity')
    .argument('[instance]', 'Instance file (defaults to instance.path from config)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--json', 'Output as JSON')
    .action((instance: string | undefined, options: InspectOptions) => {
      const context = prepareCommand(options);
      const path = resolveInstancePath(instance, context);
      const summary = summarizeInstance(path, loadKnapsack(path));

      if (options.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }
      for (const line of formatInstanceSummary(summary)) {
        console.log(line);
      }
    });

  return cmd;
}

export function summarizeInstance(path: string, knapsack: Knapsack): InstanceSummary {
  const everything = knapsack.items.map(() => true);
  return {
    path,
    numItems: knapsack.numItems,
    capacity: knapsack.capacity,
    totalValue: knapsack.value(everything),
    totalWeight: knapsack.weight(everything),
    items: knapsack.items.map(({ id, value, weight }) => ({ id, value, weight })),
  };
}

export function formatInstanceSummary(summary: InstanceSummary): string[] {
  return [
    `Instance: ${summary.path}`,
    `Items: ${summary.numItems}`,
    `Capacity: ${summary.capacity}`,
    `Total value: ${summary.totalValue}`,
    `Total weight: ${summary.totalWeight}`,
  ];
}
