interface Block {
  a: number;
  b: number;
  size: number;
}

/** Longest common substring of a[aLo, aHi) and b[bLo, bHi); earliest in `a`, then in `b`, wins ties. */
function longestMatch(a: string, b: string, aLo: number, aHi: number, bLo: number, bHi: number): Block {
  let best: Block = { a: aLo, b: bLo, size: 0 };
  let previous = new Map<number, number>();

  for (let i = aLo; i < aHi; i += 1) {
    const current = new Map<number, number>();
    for (let j = bLo; j < bHi; j += 1) {
      if (a[i] !== b[j]) {
        continue;
      }
      const length = (previous.get(j - 1) ?? 0) + 1;
      current.set(j, length);
      if (length > best.size) {
        best = { a: i - length + 1, b: j - length + 1, size: length };
      }
    }
    previous = current;
  }

  return best;
}

function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) {
      break;
    }
    const [aLo, aHi, bLo, bHi] = next;
    const block = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (block.size === 0) {
      continue;
    }
    total += block.size;
    if (aLo < block.a && bLo < block.b) {
      queue.push([aLo, block.a, bLo, block.b]);
    }
    if (block.a + block.size < aHi && block.b + block.size < bHi) {
      queue.push([block.a + block.size, aHi, block.b + block.size, bHi]);
    }
  }

  return total;
}

/**
 * Ratcliff/Obershelp similarity: twice the matched characters over the
 * combined length. Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) {
    return 1;
  }
  return (2 * matchingCharacters(a, b)) / length;
}
