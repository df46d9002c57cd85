import { type RefObject, useCallback, useEffect, useMemo } from 'react';
import { useAppDispatch, useAppSelector } from './redux';
import {
  addOverlay,
  clearOverlays,
  finishDetection,
  resetResults,
  setDetectedFrames,
  setResultsText,
  startDetection,
} from '../store/slices/detectionSlice';
import { selectModel, setModelLoadFailed, setModelLoaded, setModelLoading } from '../store/slices/modelSlice';
import { VISION_CONSTANTS } from '../config/visionConfig';
import type { ViewRect } from '../types';
import type { DetectorKind } from '../types/features';
import { applyDetectionResult, layoutOverlays, type OverlayRenderer } from '../utils/DetectionPipeline';
import type { DetectorService, ModelIndex } from '../utils/DetectorService';
import { toVisionImage } from '../utils/imageLoading';
import { errorMessage } from '../utils/errors';

// Overlays are drawn in the image element's own coordinate space
function elementViewRect(element: HTMLImageElement): ViewRect {
  const bounds = element.getBoundingClientRect();
  return { x: 0, y: 0, width: bounds.width, height: bounds.height };
}

/**
 * Runs detectors against the picture shown in `imageRef` and pushes the
 * mapped frames and results text into the store.
 */
export const useVisionDetection = (service: DetectorService, imageRef: RefObject<HTMLImageElement>) => {
  const dispatch = useAppDispatch();
  const picked = useAppSelector(state => state.image.current);
  const debugMode = useAppSelector(state => state.app.debugMode);
  const detectionState = useAppSelector(state => state.detection);
  const modelState = useAppSelector(state => state.model);
  const { frames, frameImageSize } = detectionState;

  const renderer = useMemo<OverlayRenderer>(() => ({
    addOverlay: rect => dispatch(addOverlay(rect)),
    clearOverlays: () => dispatch(clearOverlays()),
  }), [dispatch]);

  // The image is laid out with object-fit: contain, so its footprint moves on resize
  useEffect(() => {
    if (!frameImageSize || frames.length === 0) return;

    const handleResize = () => {
      const element = imageRef.current;
      if (!element) return;
      try {
        layoutOverlays(frames, frameImageSize, elementViewRect(element), renderer);
      } catch (error) {
        console.warn('⚠️ Could not re-layout overlays:', error);
        renderer.clearOverlays();
      }
    };

    window.addEventListener('resize', handleResize);
    return () => {
      window.removeEventListener('resize', handleResize);
    };
  }, [frames, frameImageSize, imageRef, renderer]);

  const runDetection = useCallback(async (kind: DetectorKind) => {
    const element = imageRef.current;
    if (!picked || !element) {
      console.warn('⚠️ No image selected, skipping detection');
      return;
    }

    dispatch(startDetection());
    dispatch(resetResults());
    const startTime = performance.now();

    try {
      const image = toVisionImage(picked, element);
      const result = await service.detectors[kind].detect(image);

      const outcome = applyDetectionResult(
        kind,
        result,
        image.size,
        elementViewRect(element),
        renderer,
        { logFeatures: debugMode }
      );

      dispatch(setDetectedFrames({ frames: outcome.frames, imageSize: image.size }));
      dispatch(setResultsText(outcome.resultsText));
      console.log(`⏱️ ${kind} finished in ${(performance.now() - startTime).toFixed(0)}ms`);
    } catch (error) {
      console.error('Detection failed:', error);
      dispatch(setResultsText(errorMessage(error, VISION_CONSTANTS.detectionNoResultsMessage)));
    } finally {
      dispatch(finishDetection());
    }
  }, [dispatch, picked, imageRef, service, renderer, debugMode]);

  const loadModel = useCallback(async (): Promise<boolean> => {
    dispatch(setModelLoading());
    try {
      const name = await service.customModel.prepare();
      dispatch(setModelLoaded(name));
      return true;
    } catch (error) {
      console.error('Failed to load custom model:', error);
      dispatch(setModelLoadFailed());
      dispatch(setResultsText(VISION_CONSTANTS.failedToLoadModelMessage));
      return false;
    }
  }, [dispatch, service]);

  const detectObjects = useCallback(async () => {
    if (await loadModel()) {
      await runDetection('customModel');
    }
  }, [loadModel, runDetection]);

  const switchModel = useCallback(async (index: ModelIndex) => {
    dispatch(selectModel(index));
    dispatch(resetResults());
    service.selectModel(index);
    await loadModel();
  }, [dispatch, service, loadModel]);

  return {
    overlays: detectionState.overlays,
    resultsText: detectionState.resultsText,
    isProcessing: detectionState.isProcessing,
    model: modelState,
    runDetection,
    detectObjects,
    switchModel,
  };
};
