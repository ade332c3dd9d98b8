import { describe, it, expect } from "vitest";
import { branchRoot } from "../../src/tree/branchroot.js";
import { createFrontier, insert } from "../../src/tree/frontier.js";
import { root } from "../../src/tree/root.js";
import type { Hash } from "../../src/tree/types.js";
import { ReferenceTree, testLeaf } from "../helpers/referencetree.js";

const SAMPLED_COUNTS = [
  0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 15, 16, 17, 31, 32, 33, 63, 64, 65, 127, 128,
  129, 255, 256, 257, 1000, 1023, 1024, 1025, 4095, 4096, 4097, 65535, 65536,
];

describe("frontier against an explicit tree", () => {
  it("reproduces the reference root at sampled counts up to 2^16", () => {
    const tree = createFrontier();
    const leaves: Hash[] = [];
    const last = SAMPLED_COUNTS[SAMPLED_COUNTS.length - 1];

    for (let n = 0; n <= last; n++) {
      if (SAMPLED_COUNTS.includes(n)) {
        expect(tree.count).toBe(n);
        expect(root(tree)).toEqual(new ReferenceTree(leaves).root());
      }
      if (n < last) {
        const leaf = testLeaf(n);
        leaves.push(leaf);
        insert(tree, leaf);
      }
    }
  });

  it("reproduces the reference root at every count of a depth 4 tree", () => {
    const tree = createFrontier();
    const leaves: Hash[] = [];
    for (let n = 0; n < 16; n++) {
      expect(root(tree, { depth: 4 })).toEqual(new ReferenceTree(leaves, 4).root());
      if (n < 15) {
        leaves.push(testLeaf(n));
        insert(tree, testLeaf(n), { depth: 4 });
      }
    }
  });
});

describe("proof round trip", () => {
  it("recomputes the frontier root from every leaf's sibling path", () => {
    const leaves = Array.from({ length: 37 }, (_, k) => testLeaf(k));
    const tree = createFrontier();
    leaves.forEach((leaf) => insert(tree, leaf));

    const reference = new ReferenceTree(leaves);
    const expected = root(tree);

    leaves.forEach((leaf, i) => {
      expect(branchRoot(leaf, reference.proof(i), i)).toEqual(expected);
    });
  });

  it("holds for every prefix of a depth 4 tree", () => {
    const leaves: Hash[] = [];
    const tree = createFrontier();

    for (let n = 1; n <= 15; n++) {
      leaves.push(testLeaf(100 + n));
      insert(tree, testLeaf(100 + n), { depth: 4 });
      const reference = new ReferenceTree(leaves, 4);
      const expected = root(tree, { depth: 4 });

      for (let i = 0; i < n; i++) {
        expect(branchRoot(leaves[i], reference.proof(i), i, { depth: 4 })).toEqual(
          expected,
        );
      }
    }
  });
});
