import React, { useRef, useState } from 'react';
import { useAppDispatch, useAppSelector } from '../../hooks/redux';
import { useImageSource } from '../../hooks/useImageSource';
import { useVisionDetection } from '../../hooks/useVisionDetection';
import { closeDetectionMenu, openDetectionMenu } from '../../store/slices/appSlice';
import type { VisionConfig } from '../../config/visionConfig';
import type { DetectorKind } from '../../types/features';
import type { DetectorService } from '../../utils/DetectorService';
import { DetectionMenu } from './DetectionMenu';
import { DetectionOverlay } from './DetectionOverlay';
import { ImageSourceButtons } from './ImageSourceButtons';
import { ModelPicker } from './ModelPicker';

interface DetectionScreenProps {
  config: VisionConfig;
  service: DetectorService;
}

export const DetectionScreen: React.FC<DetectionScreenProps> = ({ config, service }) => {
  const dispatch = useAppDispatch();
  const isMenuOpen = useAppSelector(state => state.app.isDetectionMenuOpen);
  const imageRef = useRef<HTMLImageElement>(null);
  const [imageElement, setImageElement] = useState<HTMLImageElement | null>(null);

  const image = useImageSource(config.defaultImageUrl);
  const detection = useVisionDetection(service, imageRef);

  const busy = detection.isProcessing || detection.model.isLoading;

  const handleSelect = (kind: DetectorKind) => {
    dispatch(closeDetectionMenu());
    void detection.runDetection(kind);
  };

  return (
    <div className="detection-screen">
      <div className="image-container">
        {image.current ? (
          <>
            <img
              ref={imageRef}
              src={image.current.dataUrl}
              alt={image.current.name}
              className="detection-image"
              onLoad={() => setImageElement(imageRef.current)}
            />
            <DetectionOverlay overlays={detection.overlays} imageElement={imageElement} />
          </>
        ) : (
          <div className="image-placeholder">
            {image.status === 'loading' ? 'Loading image…' : 'Pick a photo to get started'}
          </div>
        )}
      </div>

      {image.error && <div className="error-message">{image.error}</div>}

      <ModelPicker
        models={config.models.cloud}
        selectedIndex={detection.model.selectedIndex}
        loadedModel={detection.model.loadedModel}
        disabled={busy}
        onChange={index => void detection.switchModel(index)}
      />

      <pre className="results-text" aria-live="polite">
        {detection.resultsText ?? ''}
      </pre>

      <div className="toolbar">
        <ImageSourceButtons cameraAvailable={image.cameraAvailable} disabled={busy} onFile={file => void image.pickFile(file)} />
        <button type="button" disabled={busy || !image.current} onClick={() => dispatch(openDetectionMenu())}>
          Detect
        </button>
        <button type="button" disabled={busy || !image.current} onClick={() => void detection.detectObjects()}>
          Detect Objects
        </button>
      </div>

      <DetectionMenu
        isOpen={isMenuOpen}
        onSelect={handleSelect}
        onCancel={() => dispatch(closeDetectionMenu())}
      />
    </div>
  );
};
