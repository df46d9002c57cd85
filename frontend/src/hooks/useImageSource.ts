import { useCallback, useEffect } from 'react';
import { useAppDispatch, useAppSelector } from './redux';
import { setCameraAvailable, setImage, setImageError, setImageLoading } from '../store/slices/imageSlice';
import { resetResults } from '../store/slices/detectionSlice';
import { loadImageElement, readFileAsDataUrl } from '../utils/imageLoading';
import { errorMessage } from '../utils/errors';

async function hasCamera(): Promise<boolean> {
  if (!navigator.mediaDevices?.enumerateDevices) {
    return false;
  }
  const devices = await navigator.mediaDevices.enumerateDevices();
  return devices.some(device => device.kind === 'videoinput');
}

export const useImageSource = (defaultImageUrl: string | null) => {
  const dispatch = useAppDispatch();
  const imageState = useAppSelector(state => state.image);

  const showImage = useCallback(async (dataUrl: string, name: string) => {
    dispatch(setImageLoading());
    dispatch(resetResults());

    try {
      const element = await loadImageElement(dataUrl);
      dispatch(setImage({
        dataUrl,
        width: element.naturalWidth,
        height: element.naturalHeight,
        name,
      }));
      console.log(`🖼️ Image loaded: ${name} (${element.naturalWidth}x${element.naturalHeight})`);
    } catch (error) {
      console.error('Failed to load image:', error);
      dispatch(setImageError(errorMessage(error, 'Failed to load image')));
    }
  }, [dispatch]);

  const pickFile = useCallback(async (file: File) => {
    try {
      const dataUrl = await readFileAsDataUrl(file);
      await showImage(dataUrl, file.name);
    } catch (error) {
      console.error('Failed to read file:', error);
      dispatch(setImageError(errorMessage(error, 'Failed to read file')));
    }
  }, [dispatch, showImage]);

  useEffect(() => {
    hasCamera()
      .then(available => dispatch(setCameraAvailable(available)))
      .catch(error => {
        console.warn('⚠️ Could not enumerate media devices:', error);
        dispatch(setCameraAvailable(false));
      });
  }, [dispatch]);

  // The bundled sample picture is fetched and inlined so cloud detectors can upload it
  const loadUrl = useCallback(async (url: string) => {
    try {
      const response = await fetch(url);
      if (!response.ok) {
        throw new Error(`Failed to fetch ${url} (${response.status})`);
      }
      const dataUrl = await readFileAsDataUrl(await response.blob());
      await showImage(dataUrl, url.split('/').pop() || url);
    } catch (error) {
      console.error('Failed to load default image:', error);
      dispatch(setImageError(errorMessage(error, 'Failed to load image')));
    }
  }, [dispatch, showImage]);

  useEffect(() => {
    if (defaultImageUrl) {
      void loadUrl(defaultImageUrl);
    }
  }, [defaultImageUrl, loadUrl]);

  return {
    ...imageState,
    pickFile,
  };
};
