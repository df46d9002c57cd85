import React from 'react';
import { DetectionScreen } from './components/vision/DetectionScreen';
import type { VisionConfig } from './config/visionConfig';
import type { DetectorService } from './utils/DetectorService';
import './App.css';

interface AppProps {
  config: VisionConfig;
  service: DetectorService;
}

function App({ config, service }: AppProps) {
  return (
    <div className="App">
      <DetectionScreen config={config} service={service} />
    </div>
  );
}

export default App;
