import { diagonalReport } from './diagonal';

for (const line of diagonalReport()) console.log(line);
