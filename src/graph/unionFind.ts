/**
 * Disjoint-set forest over the integers [0, size)
 *
 * Union by rank with path halving; `find` is iterative, so large
 * components never grow the call stack.
 */
export class DisjointSet {
    private readonly parent: number[];
    private readonly rank: number[];

    constructor(size: number) {
        this.parent = Array.from({ length: size }, (_, i) => i);
        this.rank = new Array<number>(size).fill(0);
    }

    get size(): number {
        return this.parent.length;
    }

    find(x: number): number {
        let node = x;
        while (this.parent[node] !== node) {
            this.parent[node] = this.parent[this.parent[node]];
            node = this.parent[node];
        }
        return node;
    }

    /**
     * Merge the sets of a and b. Returns false if they were already joined.
     */
    union(a: number, b: number): boolean {
        const rootA = this.find(a);
        const rootB = this.find(b);
        if (rootA === rootB) return false;

        if (this.rank[rootA] < this.rank[rootB]) {
            this.parent[rootA] = rootB;
        } else if (this.rank[rootA] > this.rank[rootB]) {
            this.parent[rootB] = rootA;
        } else {
            this.parent[rootB] = rootA;
            this.rank[rootA]++;
        }
        return true;
    }

    connected(a: number, b: number): boolean {
        return this.find(a) === this.find(b);
    }

    /**
     * Members of every set, keyed by root
     */
    groups(): Map<number, number[]> {
        const groups = new Map<number, number[]>();
        for (let i = 0; i < this.parent.length; i++) {
            const root = this.find(i);
            const group = groups.get(root);
            if (group) {
                group.push(i);
            } else {
                groups.set(root, [i]);
            }
        }
        return groups;
    }
}
