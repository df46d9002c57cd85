import React, { useEffect, useRef } from 'react';
import type { MappedRect } from '../../types';
import { VISION_CONSTANTS } from '../../config/visionConfig';

interface DetectionOverlayProps {
  overlays: MappedRect[];
  imageElement: HTMLImageElement | null;
  className?: string;
}

export type OverlayContext = Pick<
  CanvasRenderingContext2D,
  'clearRect' | 'fillRect' | 'strokeRect' | 'lineWidth' | 'strokeStyle' | 'fillStyle'
>;

/** Clears the canvas and outlines every overlay rectangle. */
export function drawOverlays(ctx: OverlayContext, overlays: MappedRect[], width: number, height: number): void {
  ctx.clearRect(0, 0, width, height);
  ctx.lineWidth = VISION_CONSTANTS.lineWidth;
  ctx.strokeStyle = VISION_CONSTANTS.lineColor;
  ctx.fillStyle = VISION_CONSTANTS.fillColor;

  for (const rect of overlays) {
    ctx.fillRect(rect.x, rect.y, rect.width, rect.height);
    ctx.strokeRect(rect.x, rect.y, rect.width, rect.height);
  }
}

export const DetectionOverlay: React.FC<DetectionOverlayProps> = ({
  overlays,
  imageElement,
  className = 'detection-overlay',
}) => {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas || !imageElement) return;

    const ctx = canvas.getContext('2d');
    if (!ctx) return;

    const render = () => {
      // Match the rendered size of the image element
      const bounds = imageElement.getBoundingClientRect();
      canvas.width = bounds.width;
      canvas.height = bounds.height;
      drawOverlays(ctx, overlays, bounds.width, bounds.height);
    };

    render();

    window.addEventListener('resize', render);
    return () => {
      window.removeEventListener('resize', render);
    };
  }, [overlays, imageElement]);

  return (
    <canvas
      ref={canvasRef}
      className={className}
      style={{
        position: 'absolute',
        top: 0,
        left: 0,
        width: '100%',
        height: '100%',
        pointerEvents: 'none',
      }}
    />
  );
};
