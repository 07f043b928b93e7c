import { QrRenderer } from './qr-renderer';

const ARTIFACT = 'CHK1.0123456789abcdef0123456789abcdef.00112233445566778899aabbccddeeff';
const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

describe('QrRenderer', () => {
  const renderer = new QrRenderer({ width: 128 });

  it('renders a PNG image', async () => {
    const png = await renderer.renderPng(ARTIFACT);
    expect(png.subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);
  });

  it('renders the same artifact to the same bytes', async () => {
    const [a, b] = await Promise.all([renderer.renderPng(ARTIFACT), renderer.renderPng(ARTIFACT)]);
    expect(a.equals(b)).toBe(true);
  });

  it('renders SVG markup', async () => {
    const svg = await renderer.renderSvg(ARTIFACT);
    expect(svg).toContain('<svg');
  });
});
