import React, { useRef } from 'react';

interface ImageSourceButtonsProps {
  cameraAvailable: boolean;
  disabled?: boolean;
  onFile: (file: File) => void;
}

export const ImageSourceButtons: React.FC<ImageSourceButtonsProps> = ({ cameraAvailable, disabled = false, onFile }) => {
  const libraryInputRef = useRef<HTMLInputElement>(null);
  const cameraInputRef = useRef<HTMLInputElement>(null);

  const handleChange = (event: React.ChangeEvent<HTMLInputElement>) => {
    const file = event.target.files?.[0];
    if (file) onFile(file);
    // Allow picking the same file twice in a row
    event.target.value = '';
  };

  return (
    <>
      <button type="button" disabled={disabled} onClick={() => libraryInputRef.current?.click()}>
        Photo Library
      </button>
      <input ref={libraryInputRef} type="file" accept="image/*" hidden onChange={handleChange} />

      {cameraAvailable && (
        <>
          <button type="button" disabled={disabled} onClick={() => cameraInputRef.current?.click()}>
            Take Picture
          </button>
          <input
            ref={cameraInputRef}
            type="file"
            accept="image/*"
            capture="environment"
            hidden
            onChange={handleChange}
          />
        </>
      )}
    </>
  );
};
