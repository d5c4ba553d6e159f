/**
 * Sample swap puzzles
 */

export interface SamplePuzzle {
  id: string;
  name: string;
  yaml: string;
}

export const SAMPLE_PUZZLES: SamplePuzzle[] = [
  {
    id: 'sample_single_swap',
    name: 'Single Swap',
    yaml: `# The two letters of the first row trade places
id: sample_single_swap
name: "Single Swap"
from:
  - ab
  - cd
to:
  - ba
  - cd
`,
  },
  {
    id: 'sample_row_exchange',
    name: 'Row Exchange',
    yaml: `# Both rows move: two swaps, one per column
id: sample_row_exchange
name: "Row Exchange"
from: |
  ab
  cd
to: |
  cd
  ab
`,
  },
  {
    id: 'sample_waffle',
    name: 'Three Swap Waffle',
    yaml: `# 5x5 waffle, holes marked with '.'
# Three pairs of letters sit in each other's place
id: sample_waffle
name: "Three Swap Waffle"
from: |
  gnane
  h.e.a
  amonc
  s.o.f
  erter
to: |
  crane
  h.f.a
  among
  s.o.e
  enter
`,
  },
];
