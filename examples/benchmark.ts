import { Generator } from '../src/engine/Generator';
import { performance } from 'perf_hooks';

interface TestCase {
    name: string;
    targetClues: number;
    iters: number;
}

const MATRIX: TestCase[] = [
    { name: 'Easy     (45)', targetClues: 45, iters: 20 },
    { name: 'Standard (35)', targetClues: 35, iters: 10 },
    { name: 'Hard     (28)', targetClues: 28, iters: 5 },
    { name: 'Minimal  (17)', targetClues: 17, iters: 2 },
];

console.log('--- Generation Benchmark ---');

for (const test of MATRIX) {
    const generator = new Generator(Math.floor(Math.random() * 10000));

    const start = performance.now();
    let reached = 0;
    let totalClues = 0;

    process.stdout.write(`Running ${test.name} ... `);

    for (let i = 0; i < test.iters; i++) {
        const puzzle = generator.generatePuzzle({ targetClues: test.targetClues });
        const clueCount = 81 - puzzle.removedCount;
        totalClues += clueCount;
        if (clueCount === test.targetClues) reached++;
    }

    const avgMs = (performance.now() - start) / test.iters;
    const avgClues = totalClues / test.iters;
    console.log(`avg ${avgMs.toFixed(1)}ms | avg clues ${avgClues.toFixed(1)} | target reached ${reached}/${test.iters}`);
}
