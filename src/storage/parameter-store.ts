import type { Parameter } from '../model/parameter.js';
import { DatabaseFrozenError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export type ParameterPredicate = (parameter: Parameter) => boolean;

interface IndexEntry {
    key: string;
    /** Insertion sequence in the owning store; breaks ties between equal keys */
    seq: number;
    parameter: Parameter;
}

function compareEntries(a: Pick<IndexEntry, 'key' | 'seq'>, b: Pick<IndexEntry, 'key' | 'seq'>): number {
    if (a.key < b.key) return -1;
    if (a.key > b.key) return 1;
    return a.seq - b.seq;
}

/**
 * Sorted vector of (key, seq) pairs. Lookups are binary searches.
 */
class SortedIndex {
    private readonly entries: IndexEntry[] = [];

    constructor(private readonly keyOf: (parameter: Parameter) => string) {}

    insert(parameter: Parameter, seq: number): void {
        const entry: IndexEntry = { key: this.keyOf(parameter), seq, parameter };
        this.entries.splice(this.upperBound(entry), 0, entry);
    }

    range(key: string): Parameter[] {
        const result: Parameter[] = [];
        for (let i = this.lowerBound(key); i < this.entries.length; i++) {
            const entry = this.entries[i];
            if (!entry || entry.key !== key) break;
            result.push(entry.parameter);
        }
        return result;
    }

    /** Distinct keys in order */
    keys(): string[] {
        const keys: string[] = [];
        for (const entry of this.entries) {
            if (keys[keys.length - 1] !== entry.key) keys.push(entry.key);
        }
        return keys;
    }

    /** First position whose key is >= `key` */
    private lowerBound(key: string): number {
        let lo = 0;
        let hi = this.entries.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            const entry = this.entries[mid];
            if (entry && entry.key < key) lo = mid + 1;
            else hi = mid;
        }
        return lo;
    }

    /** First position ordered after `probe` */
    private upperBound(probe: Pick<IndexEntry, 'key' | 'seq'>): number {
        let lo = 0;
        let hi = this.entries.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            const entry = this.entries[mid];
            if (entry && compareEntries(entry, probe) <= 0) lo = mid + 1;
            else hi = mid;
        }
        return lo;
    }
}

/**
 * Parameters ordered two ways at once: by `phasename` and by `type`.
 * Both orderings are non-unique and break ties by insertion order.
 */
abstract class IndexedParameters implements Iterable<Parameter> {
    protected readonly byPhase = new SortedIndex((parameter) => parameter.phasename);
    protected readonly byType = new SortedIndex((parameter) => parameter.type);
    protected readonly ordered: Array<{ seq: number; parameter: Parameter }> = [];

    protected index(parameter: Parameter, seq: number): void {
        this.ordered.push({ seq, parameter });
        this.byPhase.insert(parameter, seq);
        this.byType.insert(parameter, seq);
    }

    /** Parameters whose `phasename` equals `name` */
    rangeByPhase(name: string): Parameter[] {
        return this.byPhase.range(name.toUpperCase());
    }

    /** Parameters whose `type` equals `type` */
    rangeByType(type: string): Parameter[] {
        return this.byType.range(type.toUpperCase());
    }

    /** Distinct phasename keys, sorted */
    phases(): string[] {
        return this.byPhase.keys();
    }

    /** Distinct type keys, sorted */
    types(): string[] {
        return this.byType.keys();
    }

    get size(): number {
        return this.ordered.length;
    }

    /** Insertion order */
    *[Symbol.iterator](): Iterator<Parameter> {
        for (const { parameter } of this.ordered) yield parameter;
    }

    abstract filter(predicate: ParameterPredicate): ParameterView;
}

/**
 * Owning collection of parameters, dual-indexed by phasename and type.
 */
export class ParameterStore extends IndexedParameters {
    private generation = 0;
    private frozen = false;

    insert(parameter: Parameter): void {
        if (this.frozen) throw new DatabaseFrozenError('insert parameter');
        this.index(parameter, this.ordered.length);
        this.generation++;
    }

    insertMany(parameters: Iterable<Parameter>): void {
        for (const parameter of parameters) this.insert(parameter);
    }

    /** Reject further inserts; views built from here on never go stale */
    freeze(): void {
        this.frozen = true;
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    /** Incremented by every mutation */
    get version(): number {
        return this.generation;
    }

    /**
     * Non-owning, dual-indexed subset of the parameters matching `predicate`.
     * The view holds the same `Parameter` objects as the store. It is only valid
     * until the store is next mutated; `isStale()` reports that.
     */
    buildView(predicate: ParameterPredicate): ParameterView {
        const view = new ParameterView(this, this.ordered.filter(({ parameter }) => predicate(parameter)));
        getLogger().debug({ matched: view.size, total: this.size }, 'Parameter view built');
        return view;
    }

    filter(predicate: ParameterPredicate): ParameterView {
        return this.buildView(predicate);
    }
}

/**
 * Filtered references into a `ParameterStore`, indexed the same way as the store.
 */
export class ParameterView extends IndexedParameters {
    constructor(
        private readonly store: ParameterStore,
        entries: ReadonlyArray<{ seq: number; parameter: Parameter }>,
        private readonly builtAt: number = store.version
    ) {
        super();
        for (const { seq, parameter } of entries) this.index(parameter, seq);
    }

    /** True once the backing store has changed since the view was built */
    isStale(): boolean {
        return this.store.version !== this.builtAt;
    }

    /** Narrow this view further; the result still references the backing store */
    filter(predicate: ParameterPredicate): ParameterView {
        return new ParameterView(
            this.store,
            this.ordered.filter(({ parameter }) => predicate(parameter)),
            this.builtAt
        );
    }
}
