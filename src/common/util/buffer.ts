//#region ============== Types ==============
const BufferSize = {
    UInt8:  1,
    UInt16: 2,
    UInt32: 4
} as const;
type BufferSize = typeof BufferSize[keyof typeof BufferSize];
//#endregion ============== Types ==============

/**
 * Thrown when a {@link BufferReader} is asked for more bytes than it has left.
 */
class BufferUnderflowError extends RangeError {
    constructor(requested: number, remaining: number) {
        super(`Attempted to read ${requested} byte(s) with only ${remaining} remaining.`);
        this.name = "BufferUnderflowError";
    }
}

/**
 * Utility class for writing operations for buffers.
 * Writes using Big Endian.
 */
class BufferWriter {
    protected buffers: Buffer[];
    protected _totalLength: number;

    constructor() {
        this.buffers = [];
        this._totalLength = 0;
    }

    public get length(): number {
        return this._totalLength;
    }

    public finish(): Buffer {
        return Buffer.concat(this.buffers, this._totalLength);
    }

    //#region ======= Writers =======
    private _write(size: BufferSize, value: number) {
        const buf = Buffer.alloc(size);
        buf.writeUIntBE(value, 0, size);

        this.buffers.push(buf);
        this._totalLength += size;
    }

    public write(value: Buffer): void {
        this.buffers.push(value);
        this._totalLength += value.byteLength;
    }

    public writeUInt8(value: number): void { this._write(BufferSize.UInt8, value); }
    public writeUInt16(value: number): void { this._write(BufferSize.UInt16, value); }
    public writeUInt32(value: number): void { this._write(BufferSize.UInt32, value); }
    //#endregion ====== Writers =======
}

/**
 * Sequential buffer reader with automatic offset.
 */
class BufferReader {
    protected buffer: Buffer;
    protected offset: number;

    constructor(buffer: Buffer, offset?: number) {
        this.buffer = buffer;
        this.offset = offset ?? 0;
    }

    public get position(): number {
        return this.offset;
    }

    public remaining(): number {
        return this.buffer.byteLength - this.offset;
    }

    public eof(): boolean {
        return this.offset >= this.buffer.byteLength;
    }

    /**
     * Returns the next byte without advancing.
     */
    public peek(): number {
        this.ensure(1);
        return this.buffer[this.offset];
    }

    //#region ======= Readers =======
    private ensure(size: number) {
        if (size > this.remaining()) throw new BufferUnderflowError(size, this.remaining());
    }

    private _read(size: BufferSize) {
        this.ensure(size);
        const value = this.buffer.readUIntBE(this.offset, size);
        this.offset += size;

        return value;
    }

    public read(size: number): Buffer {
        this.ensure(size);
        const value = this.buffer.subarray(this.offset, this.offset + size);
        this.offset += size;

        return value;
    }

    /**
     * Reads every byte left in the buffer.
     */
    public readRest(): Buffer {
        return this.read(this.remaining());
    }

    public readUInt8(): number { return this._read(BufferSize.UInt8); }
    public readUInt16(): number { return this._read(BufferSize.UInt16); }
    //#endregion ====== Readers =======
}

export {
    BufferUnderflowError,
    BufferWriter,
    BufferReader
};
