/** Append-only sink for serialisable records. */
export interface Journal<T> {
	record(entry: T): Promise<void>;
	flush(): Promise<void>;
}
