/**
 * Headless Snapshot Example
 *
 * Runs a capture session in Node against a synthetic MJPEG camera and saves
 * one RGB frame as a PNG.
 *
 * Run: npx tsx examples/headless-snapshot.ts [output.png]
 */

import sharp from 'sharp';

import {
  CameraControl,
  CameraFormat,
  CaptureSession,
  ConstraintsBuilder,
  FrameSourceMediaDevices,
  HeadlessRenderSurface,
  Resolution,
  queryCameras,
  type DeviceDescriptor,
  type FrameSource,
  type FrameSourceHandle,
  type RawFrame,
} from '../src/index.js';

const BARS: [number, number, number][] = [
  [255, 255, 255],
  [255, 255, 0],
  [0, 255, 255],
  [0, 255, 0],
  [255, 0, 255],
  [255, 0, 0],
  [0, 0, 255],
  [0, 0, 0],
];

/**
 * Color bars, encoded as JPEG per frame like a UVC camera in MJPEG mode
 */
class ColorBarHandle implements FrameSourceHandle {
  readonly format: CameraFormat;

  constructor(format: CameraFormat) {
    this.format = format;
  }

  async readFrame(): Promise<RawFrame> {
    const { width, height } = this.format;
    const pixels = Buffer.alloc(width * height * 3);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const [r, g, b] = BARS[Math.floor((x * BARS.length) / width)];
        const offset = (y * width + x) * 3;
        pixels[offset] = r;
        pixels[offset + 1] = g;
        pixels[offset + 2] = b;
      }
    }

    const jpeg = await sharp(pixels, { raw: { width, height, channels: 3 } }).jpeg().toBuffer();
    return { format: 'MJPEG', resolution: this.format.resolution, data: new Uint8Array(jpeg) };
  }

  async controls(): Promise<CameraControl[]> {
    return [];
  }

  close(): void {
    console.log('Camera closed');
  }
}

class ColorBarSource implements FrameSource {
  async enumerate(): Promise<DeviceDescriptor[]> {
    return [{ deviceId: 'bars-0', groupId: 'bars', index: 0, name: 'Color Bars', description: 'synthetic' }];
  }

  async open(_device: DeviceDescriptor, format: CameraFormat): Promise<FrameSourceHandle> {
    return new ColorBarHandle(format);
  }
}

async function main(): Promise<void> {
  const output = process.argv[2] ?? 'snapshot.png';
  const mediaDevices = new FrameSourceMediaDevices(new ColorBarSource());
  const surface = new HeadlessRenderSurface();
  surface.addContainer('preview');

  for (const camera of await queryCameras(mediaDevices)) {
    console.log(camera.toString());
  }

  const constraints = new ConstraintsBuilder()
    .resolution(new Resolution(320, 240))
    .frameRate(30)
    .build();
  console.log('Request:', JSON.stringify(constraints.request));

  const session = await CaptureSession.open(constraints, { mediaDevices, surface });
  try {
    session.attach('preview', true);
    const frame = session.frame();
    console.log(`Captured ${frame.width}x${frame.height} ${frame.format} (${frame.data.length} bytes)`);

    await sharp(Buffer.from(frame.data), {
      raw: { width: frame.width, height: frame.height, channels: 3 },
    }).png().toFile(output);
    console.log(`Saved ${output}`);
  } finally {
    session.close();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
