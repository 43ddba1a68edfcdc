export const NAME = 'cliff-knapsack';
export const VERSION = '0.1.0';
