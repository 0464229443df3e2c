export {};

throw new Error('module evaluation failed');
