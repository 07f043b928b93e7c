import * as QRCode from 'qrcode';

export type QrErrorCorrection = 'L' | 'M' | 'Q' | 'H';

export interface QrRenderOptions {
  width?: number;
  margin?: number;
  errorCorrectionLevel?: QrErrorCorrection;
}

/**
 * Renders artifacts as QR codes for the student-facing rendering layer.
 * Output depends only on the artifact text and the options.
 */
export class QrRenderer {
  private readonly width: number;
  private readonly margin: number;
  private readonly errorCorrectionLevel: QrErrorCorrection;

  constructor(options: QrRenderOptions = {}) {
    this.width = options.width ?? 300;
    this.margin = options.margin ?? 2;
    this.errorCorrectionLevel = options.errorCorrectionLevel ?? 'M';
  }

  renderPng(artifact: string): Promise<Buffer> {
    return QRCode.toBuffer(artifact, {
      type: 'png',
      errorCorrectionLevel: this.errorCorrectionLevel,
      margin: this.margin,
      width: this.width,
    });
  }

  renderSvg(artifact: string): Promise<string> {
    return QRCode.toString(artifact, {
      type: 'svg',
      errorCorrectionLevel: this.errorCorrectionLevel,
      margin: this.margin,
      width: this.width,
    });
  }
}
