import { Tree } from "../../src/tree/tree.js";
import { buildNumberedTree, expectTreeError, values } from "../testUtils.js";

describe("Tree topology", () => {
  describe("appendChild", () => {
    it("lists fresh children in append order", () => {
      const tree = new Tree<string>();
      const p = tree.insert("p");
      const c1 = tree.insert("c1");
      const c2 = tree.insert("c2");
      const c3 = tree.insert("c3");
      for (const k of [c1, c2, c3]) tree.appendChild(p, k);

      expect(Array.from(tree.children(p))).toEqual([c1, c2, c3]);
      expect(tree.firstChild(p)).toEqual(c1);
      expect(tree.lastChild(p)).toEqual(c3);
      expect(tree.previousSibling(c1)).toBeNull();
      expect(tree.nextSibling(c2)).toEqual(c3);
      expect(tree.nextSibling(c3)).toBeNull();
    });

    it("moves an attached node together with its subtree", () => {
      const tree = new Tree<string>();
      const root = tree.insertRoot("root");
      const p1 = tree.insert("p1", root);
      const p2 = tree.insert("p2", root);
      tree.insert("a", p1);
      const c = tree.insert("c", p1);
      tree.insert("b", p1);
      tree.insert("x", p2);
      const g1 = tree.insert("g1", c);
      const g2 = tree.insert("g2", c);

      tree.appendChild(p2, c);

      expect(values(tree, tree.children(p1))).toEqual(["a", "b"]);
      expect(values(tree, tree.children(p2))).toEqual(["x", "c"]);
      expect(tree.parent(c)).toEqual(p2);
      expect(Array.from(tree.children(c))).toEqual([g1, g2]);
      expect(tree.parent(g1)).toEqual(c);
      expect(values(tree, tree.descendants(root))).toEqual(["root", "p1", "a", "b", "p2", "x", "c", "g1", "g2"]);
    });

    it("re-appending the last child to the same parent keeps the order", () => {
      const tree = new Tree<string>();
      const p = tree.insert("p");
      tree.insert("a", p);
      const b = tree.insert("b", p);
      tree.appendChild(p, b);
      expect(values(tree, tree.children(p))).toEqual(["a", "b"]);
    });

    it("re-appending the first child moves it to the end", () => {
      const tree = new Tree<string>();
      const p = tree.insert("p");
      const a = tree.insert("a", p);
      tree.insert("b", p);
      const c = tree.insert("c", p);
      tree.appendChild(p, a);
      expect(values(tree, tree.children(p))).toEqual(["b", "c", "a"]);
      expect(tree.previousSibling(a)).toEqual(c);
      expect(tree.nextSibling(c)).toEqual(a);
      expect(tree.lastChild(p)).toEqual(a);
    });

    it("rejects appending a node to itself", () => {
      const tree = new Tree<string>();
      const p = tree.insert("p");
      const a = tree.insert("a", p);

      expectTreeError(() => tree.appendChild(a, a), "SELF_APPEND");
      expect(tree.parent(a)).toEqual(p);
    });

    it("rejects appending a node under its own descendant", () => {
      const { tree, n } = buildNumberedTree();
      const [n0, n1, , , n4, , n6] = n;

      expectTreeError(() => tree.appendChild(n6, n1), "CYCLE");
      expectTreeError(() => tree.appendChild(n4, n0), "CYCLE");
      expect(tree.parent(n1)).toEqual(n0);
      expect(values(tree, tree.descendants(n0))).toEqual([0, 1, 4, 6, 5, 2, 7, 3]);
    });

    it("changes nothing when either endpoint is stale", () => {
      const tree = new Tree<string>();
      const p = tree.insert("p");
      const c = tree.insert("c", p);
      const gone = tree.insert("gone");
      tree.remove(gone);

      expectTreeError(() => tree.appendChild(gone, c), "STALE_HANDLE");
      expectTreeError(() => tree.appendChild(p, gone), "STALE_HANDLE");
      expect(tree.parent(c)).toEqual(p);
      expect(Array.from(tree.children(p))).toEqual([c]);
    });
  });

  describe("detach", () => {
    it("unlinks the node but keeps its subtree", () => {
      const { tree, n } = buildNumberedTree();
      const [n0, n1, n2, n3, n4] = n;

      tree.detach(n1);
      expect(Array.from(tree.children(n0))).toEqual([n2, n3]);
      expect(tree.previousSibling(n2)).toBeNull();
      expect(tree.parent(n1)).toBeNull();
      expect(tree.nextSibling(n1)).toBeNull();
      expect(tree.firstChild(n1)).toEqual(n4);
      expect(values(tree, tree.descendants(n1))).toEqual([1, 4, 6, 5]);
      expect(tree.contains(n1)).toBe(true);
    });

    it("is a no-op when repeated", () => {
      const tree = new Tree<string>();
      const root = tree.insertRoot("r");
      const a = tree.insert("a", root);
      const b = tree.insert("b", root);
      const c = tree.insert("c", root);

      tree.detach(b);
      const after = tree.describe(b);
      tree.detach(b);

      expect(tree.describe(b)).toBe(after);
      expect(Array.from(tree.children(root))).toEqual([a, c]);
      expect(tree.nextSibling(a)).toEqual(c);
      expect(tree.previousSibling(c)).toEqual(a);
    });

    it("ignores unattached and stale nodes", () => {
      const tree = new Tree<string>();
      const lone = tree.insert("lone");
      tree.detach(lone);
      expect(tree.describe(lone)).toBe(
        "Parent: none, Previous sibling: none, Next sibling: none, First child: none, Last child: none"
      );

      tree.remove(lone);
      expect(() => tree.detach(lone)).not.toThrow();
    });

    it("lets the only child leave its parent empty", () => {
      const tree = new Tree<string>();
      const p = tree.insert("p");
      const only = tree.insert("only", p);
      tree.detach(only);
      expect(tree.firstChild(p)).toBeNull();
      expect(tree.lastChild(p)).toBeNull();
      expect(tree.childCount(p)).toBe(0);
    });
  });

  describe("remove", () => {
    it("deletes the whole subtree and leaves unrelated siblings alone", () => {
      const tree = new Tree<string>();
      const root = tree.insertRoot("root");
      const before = tree.insert("before", root);
      const a = tree.insert("A", root);
      const after = tree.insert("after", root);
      const b = tree.insert("B", a);
      const c = tree.insert("C", b);
      const cousin = tree.insert("cousin", before);

      expect(tree.remove(a)).toBe("A");

      for (const h of [a, b, c]) {
        expect(tree.contains(h)).toBe(false);
        expect(tree.get(h)).toBeUndefined();
      }
      expect(Array.from(tree.children(root))).toEqual([before, after]);
      expect(tree.nextSibling(before)).toEqual(after);
      expect(tree.previousSibling(after)).toEqual(before);
      expect(tree.at(cousin)).toBe("cousin");
      expect(tree.size).toBe(4);
    });

    it("relinks head, middle and tail positions", () => {
      const tree = new Tree<string>();
      const p = tree.insert("p");
      const [a, b, c, d, e] = ["a", "b", "c", "d", "e"].map((s) => tree.insert(s, p));
      if (!a || !b || !c || !d || !e) throw new Error("setup");

      tree.remove(a);
      expect(tree.firstChild(p)).toEqual(b);
      expect(tree.previousSibling(b)).toBeNull();

      tree.remove(e);
      expect(tree.lastChild(p)).toEqual(d);
      expect(tree.nextSibling(d)).toBeNull();

      tree.remove(c);
      expect(tree.nextSibling(b)).toEqual(d);
      expect(tree.previousSibling(d)).toEqual(b);

      tree.remove(b);
      tree.remove(d);
      expect(tree.firstChild(p)).toBeNull();
      expect(tree.lastChild(p)).toBeNull();
    });

    it("shrinks the numbered tree by the removed subtree", () => {
      const { tree, n } = buildNumberedTree();
      const [n0, n1, n2, n3, n4, n5, n6] = n;

      expect(tree.size).toBe(8);
      expect(tree.remove(n1)).toBe(1);
      expect(tree.size).toBe(4);
      expect(Array.from(tree.children(n0))).toEqual([n2, n3]);
      expect([n4, n5, n6].map((h) => tree.contains(h))).toEqual([false, false, false]);
      expect(values(tree, tree.descendants(n0))).toEqual([0, 2, 7, 3]);
    });

    it("frees slots for reuse under new generations", () => {
      const { tree, n } = buildNumberedTree();
      const [n0, n1] = n;
      tree.remove(n1);

      const fresh = tree.insert(100, n0);
      expect(tree.get(n1)).toBeUndefined();
      expect(tree.at(fresh)).toBe(100);
      expect(fresh.generation).toBe(1);
      expect(tree.capacity).toBe(8);
    });
  });

  describe("queries", () => {
    it("isAncestor and childCount follow the links", () => {
      const { tree, n } = buildNumberedTree();
      const [n0, n1, n2, n3, , , n6, n7] = n;

      expect(tree.isAncestor(n0, n6)).toBe(true);
      expect(tree.isAncestor(n1, n7)).toBe(false);
      expect(tree.isAncestor(n6, n6)).toBe(false);
      expect(tree.childCount(n0)).toBe(3);
      expect(tree.childCount(n2)).toBe(1);
      expect(tree.childCount(n3)).toBe(0);
    });
  });
});
