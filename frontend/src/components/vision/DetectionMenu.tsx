import React from 'react';
import { DETECTION_MENU } from '../../config/visionConfig';
import type { DetectorKind } from '../../types/features';

interface DetectionMenuProps {
  isOpen: boolean;
  onSelect: (kind: DetectorKind) => void;
  onCancel: () => void;
}

export const DetectionMenu: React.FC<DetectionMenuProps> = ({ isOpen, onSelect, onCancel }) => {
  if (!isOpen) return null;

  return (
    <div className="detection-menu-backdrop" onClick={onCancel}>
      <div
        className="detection-menu"
        role="dialog"
        aria-label="Select Detector"
        onClick={event => event.stopPropagation()}
      >
        <h2>Select Detector</h2>
        {DETECTION_MENU.map(entry => (
          <button
            key={entry.kind}
            type="button"
            className="detection-menu-item"
            onClick={() => onSelect(entry.kind)}
          >
            {entry.title}
          </button>
        ))}
        <button type="button" className="detection-menu-cancel" onClick={onCancel}>
          Cancel
        </button>
      </div>
    </div>
  );
};
