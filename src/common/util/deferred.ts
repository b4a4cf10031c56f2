/**
 * A promise that is settled from the outside, used as a one-shot signal between a producer and a consumer.
 * Only the first call to {@link resolve} or {@link reject} takes effect.
 */
class Deferred<T> {
    public readonly promise: Promise<T>;
    private _settled: boolean;
    private _resolve: (value: T) => void = () => {};
    private _reject: (err: Error) => void = () => {};

    public constructor() {
        this._settled = false;
        this.promise = new Promise<T>((resolve, reject) => {
            this._resolve = resolve;
            this._reject = reject;
        });
    }

    public resolve(value: T): void {
        if (this._settled) return;
        this._settled = true;
        this._resolve(value);
    }

    public reject(err: Error): void {
        if (this._settled) return;
        this._settled = true;
        this._reject(err);
    }
}

export {
    Deferred
};
