import React from 'react';
import type { ModelSource } from '../../config/visionConfig';
import type { ModelIndex } from '../../utils/DetectorService';

interface ModelPickerProps {
  models: [ModelSource, ModelSource];
  selectedIndex: ModelIndex;
  loadedModel?: string | null;
  disabled?: boolean;
  onChange: (index: ModelIndex) => void;
}

const MODEL_INDICES: ModelIndex[] = [0, 1];

export const ModelPicker: React.FC<ModelPickerProps> = ({
  models,
  selectedIndex,
  loadedModel = null,
  disabled = false,
  onChange,
}) => (
  <div className="model-picker">
    <div className="model-picker-segments" role="radiogroup" aria-label="Custom model">
      {MODEL_INDICES.map(index => (
        <button
          key={models[index].name}
          type="button"
          role="radio"
          aria-checked={selectedIndex === index}
          className={selectedIndex === index ? 'segment selected' : 'segment'}
          disabled={disabled}
          onClick={() => {
            if (index !== selectedIndex) onChange(index);
          }}
        >
          {models[index].name}
        </button>
      ))}
    </div>
    {/* The bundled model stands in when the selected one fails to load */}
    {loadedModel && <div className="model-status">Using model: {loadedModel}</div>}
  </div>
);
