export const TAG_END = 0;
export const TAG_BYTE = 1;
export const TAG_SHORT = 2;
export const TAG_INT = 3;
export const TAG_LONG = 4;
export const TAG_FLOAT = 5;
export const TAG_DOUBLE = 6;
export const TAG_BYTE_ARRAY = 7;
export const TAG_STRING = 8;
export const TAG_LIST = 9;
export const TAG_COMPOUND = 10;
export const TAG_INT_ARRAY = 11;
export const TAG_LONG_ARRAY = 12;

/**
 * Tagged NBT value. Every tag names its on-wire type so integer widths are
 * never inferred from the JavaScript value.
 */
export type NbtTag =
  | { type: "byte"; value: number }
  | { type: "short"; value: number }
  | { type: "int"; value: number }
  | { type: "long"; value: bigint }
  | { type: "float"; value: number }
  | { type: "double"; value: number }
  | { type: "byteArray"; value: Uint8Array }
  | { type: "string"; value: string }
  | { type: "list"; elementType: NbtTagType; value: NbtTag[] }
  | { type: "compound"; value: NbtCompound }
  | { type: "intArray"; value: number[] }
  | { type: "longArray"; value: bigint[] };

export type NbtTagType = NbtTag["type"];

/** Ordered entries; written in array order. */
export type NbtCompound = Array<[string, NbtTag]>;

const TAG_IDS: Record<NbtTagType, number> = {
  byte: TAG_BYTE,
  short: TAG_SHORT,
  int: TAG_INT,
  long: TAG_LONG,
  float: TAG_FLOAT,
  double: TAG_DOUBLE,
  byteArray: TAG_BYTE_ARRAY,
  string: TAG_STRING,
  list: TAG_LIST,
  compound: TAG_COMPOUND,
  intArray: TAG_INT_ARRAY,
  longArray: TAG_LONG_ARRAY
};

export const nbt = {
  byte: (value: number): NbtTag => ({ type: "byte", value }),
  short: (value: number): NbtTag => ({ type: "short", value }),
  int: (value: number): NbtTag => ({ type: "int", value }),
  long: (value: bigint): NbtTag => ({ type: "long", value }),
  string: (value: string): NbtTag => ({ type: "string", value }),
  byteArray: (value: Uint8Array): NbtTag => ({ type: "byteArray", value }),
  intArray: (value: number[]): NbtTag => ({ type: "intArray", value }),
  list: (elementType: NbtTagType, value: NbtTag[]): NbtTag => ({ type: "list", elementType, value }),
  compound: (value: NbtCompound): NbtTag => ({ type: "compound", value })
};

class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  public offset = 0;

  public constructor(initialSize = 256) {
    this.buffer = new Uint8Array(initialSize);
    this.view = new DataView(this.buffer.buffer);
  }

  private reserve(size: number): void {
    const needed = this.offset + size;
    if (needed <= this.buffer.length) return;
    let next = this.buffer.length * 2;
    while (next < needed) next *= 2;
    const grown = new Uint8Array(next);
    grown.set(this.buffer.subarray(0, this.offset));
    this.buffer = grown;
    this.view = new DataView(grown.buffer);
  }

  public u8(v: number): void {
    this.reserve(1);
    this.view.setUint8(this.offset, v);
    this.offset += 1;
  }

  public i8(v: number): void {
    this.reserve(1);
    this.view.setInt8(this.offset, v);
    this.offset += 1;
  }

  public i16(v: number): void {
    this.reserve(2);
    this.view.setInt16(this.offset, v, false);
    this.offset += 2;
  }

  public u16(v: number): void {
    this.reserve(2);
    this.view.setUint16(this.offset, v, false);
    this.offset += 2;
  }

  public i32(v: number): void {
    this.reserve(4);
    this.view.setInt32(this.offset, v, false);
    this.offset += 4;
  }

  public i64(v: bigint): void {
    this.reserve(8);
    this.view.setBigInt64(this.offset, v, false);
    this.offset += 8;
  }

  public f32(v: number): void {
    this.reserve(4);
    this.view.setFloat32(this.offset, v, false);
    this.offset += 4;
  }

  public f64(v: number): void {
    this.reserve(8);
    this.view.setFloat64(this.offset, v, false);
    this.offset += 8;
  }

  public bytes(b: Uint8Array): void {
    this.reserve(b.length);
    this.buffer.set(b, this.offset);
    this.offset += b.length;
  }

  public result(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}

function assertRange(name: string, v: number, min: number, max: number): void {
  if (!Number.isInteger(v) || v < min || v > max) {
    throw new RangeError(`NBT_${name}_OUT_OF_RANGE value=${v}`);
  }
}

function writeString(w: Writer, value: string): void {
  const encoded = Buffer.from(value, "utf8");
  assertRange("STRING_LENGTH", encoded.length, 0, 0x7fff);
  w.u16(encoded.length);
  w.bytes(encoded);
}

function writePayload(w: Writer, tag: NbtTag): void {
  switch (tag.type) {
    case "byte":
      assertRange("BYTE", tag.value, -128, 127);
      w.i8(tag.value);
      return;
    case "short":
      assertRange("SHORT", tag.value, -32768, 32767);
      w.i16(tag.value);
      return;
    case "int":
      assertRange("INT", tag.value, -2147483648, 2147483647);
      w.i32(tag.value);
      return;
    case "long":
      w.i64(tag.value);
      return;
    case "float":
      w.f32(tag.value);
      return;
    case "double":
      w.f64(tag.value);
      return;
    case "byteArray":
      w.i32(tag.value.length);
      w.bytes(tag.value);
      return;
    case "string":
      writeString(w, tag.value);
      return;
    case "list":
      w.u8(TAG_IDS[tag.elementType]);
      w.i32(tag.value.length);
      for (const item of tag.value) {
        if (item.type !== tag.elementType) {
          throw new TypeError(`NBT_LIST_MIXED_TYPES expected=${tag.elementType} got=${item.type}`);
        }
        writePayload(w, item);
      }
      return;
    case "compound":
      for (const [name, child] of tag.value) {
        w.u8(TAG_IDS[child.type]);
        writeString(w, name);
        writePayload(w, child);
      }
      w.u8(TAG_END);
      return;
    case "intArray":
      w.i32(tag.value.length);
      for (const v of tag.value) {
        assertRange("INT", v, -2147483648, 2147483647);
        w.i32(v);
      }
      return;
    case "longArray":
      w.i32(tag.value.length);
      for (const v of tag.value) w.i64(v);
      return;
  }
}

/**
 * Serializes a named root compound, uncompressed and big-endian.
 */
export function writeNbt(rootName: string, root: NbtCompound): Uint8Array {
  const w = new Writer();
  w.u8(TAG_COMPOUND);
  writeString(w, rootName);
  writePayload(w, { type: "compound", value: root });
  return w.result();
}

/**
 * Big-endian reads over a byte view. Every read checks the remaining length.
 */
class Reader {
  private readonly view: DataView;
  public offset = 0;

  public constructor(private readonly input: Uint8Array) {
    this.view = new DataView(input.buffer, input.byteOffset, input.byteLength);
  }

  private take(size: number): number {
    const at = this.offset;
    if (size < 0 || at + size > this.input.length) {
      throw new RangeError(`NBT_TRUNCATED offset=${at} need=${size}`);
    }
    this.offset += size;
    return at;
  }

  public u8(): number {
    return this.view.getUint8(this.take(1));
  }

  public i8(): number {
    return this.view.getInt8(this.take(1));
  }

  public i16(): number {
    return this.view.getInt16(this.take(2), false);
  }

  public u16(): number {
    return this.view.getUint16(this.take(2), false);
  }

  public i32(): number {
    return this.view.getInt32(this.take(4), false);
  }

  public i64(): bigint {
    return this.view.getBigInt64(this.take(8), false);
  }

  public bytes(n: number): Uint8Array {
    const at = this.take(n);
    return this.input.slice(at, at + n);
  }

  public length(name: string): number {
    const n = this.i32();
    if (n < 0) throw new RangeError(`NBT_${name}_NEGATIVE_LENGTH`);
    return n;
  }
}

const READABLE_TYPES: NbtTagType[] = [
  "byte",
  "short",
  "int",
  "long",
  "string",
  "byteArray",
  "intArray",
  "list",
  "compound"
];
const TAG_TYPES = new Map(READABLE_TYPES.map((type): [number, NbtTagType] => [TAG_IDS[type], type]));

function tagTypeOf(id: number): NbtTagType {
  const type = TAG_TYPES.get(id);
  if (type === undefined) throw new TypeError(`NBT_UNSUPPORTED_TAG ${id}`);
  return type;
}

function readString(r: Reader): string {
  return Buffer.from(r.bytes(r.u16())).toString("utf8");
}

/**
 * Inverse of writePayload for the tags a schematic carries.
 */
function readPayload(r: Reader, type: NbtTagType): NbtTag {
  switch (type) {
    case "byte":
      return nbt.byte(r.i8());
    case "short":
      return nbt.short(r.i16());
    case "int":
      return nbt.int(r.i32());
    case "long":
      return nbt.long(r.i64());
    case "string":
      return nbt.string(readString(r));
    case "byteArray":
      return nbt.byteArray(r.bytes(r.length("BYTE_ARRAY")));
    case "intArray": {
      const values: number[] = [];
      for (let n = r.length("INT_ARRAY"); n > 0; n--) values.push(r.i32());
      return nbt.intArray(values);
    }
    case "list": {
      const elementId = r.u8();
      const n = r.length("LIST");
      // An empty list may declare TAG_End as its element type.
      const elementType = elementId === TAG_END && n === 0 ? "compound" : tagTypeOf(elementId);
      const items: NbtTag[] = [];
      for (let i = 0; i < n; i++) items.push(readPayload(r, elementType));
      return nbt.list(elementType, items);
    }
    case "compound": {
      const entries: NbtCompound = [];
      for (let id = r.u8(); id !== TAG_END; id = r.u8()) {
        const name = readString(r);
        entries.push([name, readPayload(r, tagTypeOf(id))]);
      }
      return nbt.compound(entries);
    }
    case "float":
    case "double":
    case "longArray":
      throw new TypeError(`NBT_UNSUPPORTED_TAG ${type}`);
  }
}

/**
 * Parses an uncompressed tag tree whose root is a named compound.
 */
export function readNbt(input: Uint8Array): { rootName: string; root: NbtCompound } {
  const r = new Reader(input);
  const rootId = r.u8();
  if (rootId !== TAG_COMPOUND) {
    throw new TypeError(`NBT_ROOT_NOT_COMPOUND ${rootId}`);
  }
  const rootName = readString(r);
  const root = readPayload(r, "compound");
  if (root.type !== "compound") {
    throw new TypeError("NBT_ROOT_PAYLOAD_INVALID");
  }
  return { rootName, root: root.value };
}

/** First entry named `name`, if any. */
export function nbtField(compound: NbtCompound, name: string): NbtTag | undefined {
  return compound.find(([key]) => key === name)?.[1];
}
