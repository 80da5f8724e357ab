import jsQR from "jsqr";
import sharp from "sharp";

// Splits a row into runs of equal values.
function group<T>(arr: ReadonlyArray<T>) {
  const groups: T[][] = [];
  let last = arr[0];
  let group: T[] = [];
  for (let i = 0; i < arr.length; i++) {
    const current = arr[i];
    if (current === last) {
      group.push(current);
    } else {
      groups.push(group);
      group = [current];
      last = current;
    }
  }
  groups.push(group);
  return groups;
}

const DOT_SIZE = 2;
function buildPath(bitmap: ReadonlyArray<ReadonlyArray<boolean>>) {
  const OFFSET = DOT_SIZE / 2;
  let path = "";
  for (let y = 0; y < bitmap.length; y++) {
    const line = group(bitmap[y]);
    const len = line.length;

    for (let i = 0; i < len; i++) {
      const group = line[i];

      if (group[0] === false && i === 0) {
        // if the first element is false, then it's a gap and we can move directly to the next group
        path += `M${group.length * DOT_SIZE} ${y * DOT_SIZE + OFFSET}`;
        continue;
      } else if (group[0] === true && i === 0) {
        // Otherwise we have to move to the start of the line
        path += `M0 ${y * DOT_SIZE + OFFSET}`;
      }

      // if the last element is false, then it's a gap and we can move directly to the next line
      if (i === len - 1 && group[0] === false) {
        break;
      }

      if (group[0]) {
        path += `h${group.length * DOT_SIZE}`;
      } else {
        path += `m${group.length * DOT_SIZE} 0`;
      }
    }
  }
  return path;
}

// Draws the bitmap as a single-path SVG, 8 pixels per module.
export function toSvg(bitmap: ReadonlyArray<ReadonlyArray<boolean>>): string {
  const widthHeight = bitmap.length * DOT_SIZE;
  const size = bitmap.length * 8;
  return `<svg  xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${widthHeight} ${widthHeight}" width="${size}" height="${size}"><path stroke="#000" stroke-width="${DOT_SIZE}" d="${buildPath(bitmap)}" /></svg>`;
}

// Rasterizes the bitmap and reads it back with a QR decoder.
export async function scanBitmap(
  bitmap: ReadonlyArray<ReadonlyArray<boolean>>
): Promise<string | undefined> {
  const { data, info } = await sharp(Buffer.from(toSvg(bitmap)))
    .flatten({
      background: { r: 255, g: 255, b: 255 },
    })
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  const code = jsQR(
    new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength),
    info.width,
    info.height
  );

  return code?.data;
}
