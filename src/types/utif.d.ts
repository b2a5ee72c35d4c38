declare module 'utif' {
  export type TagValue = ReadonlyArray<number | string>;

  export interface IFD {
    [tag: `t${number}`]: TagValue | undefined;
    width?: number;
    height?: number;
    data?: Uint8Array;
    isLE?: boolean;
    subIFD?: IFD[];
    exifIFD?: IFD;
  }

  export function decode(buffer: ArrayBuffer | Uint8Array, options?: { parseMN?: boolean; debug?: boolean }): IFD[];
  export function decodeImage(buffer: ArrayBuffer | Uint8Array, ifd: IFD, ifds?: IFD[]): void;
  export function toRGBA8(ifd: IFD): Uint8Array;

  const UTIF: {
    decode: typeof decode;
    decodeImage: typeof decodeImage;
    toRGBA8: typeof toRGBA8;
  };

  export default UTIF;
}
