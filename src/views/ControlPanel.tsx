import React from 'react';
import { SIMULATION_CONSTANTS } from '../physics/constants';
import { PRESETS, PRESET_IDS, isPresetId } from '../presets/presets';
import type { PresetId } from '../presets/presets';

interface ControlPanelProps {
  selectedPreset: PresetId;
  dt: number;
  running: boolean;
  stepCount: number;
  elapsedTime: number;
  activeCount: number;
  particleCount: number;
  errorMessage: string | null;
  onPresetChange: (presetId: PresetId) => void;
  onDtChange: (dt: number) => void;
  onTogglePause: () => void;
  onReset: () => void;
}

export function dtToSliderValue(dt: number): number {
  return Math.round(dt * SIMULATION_CONSTANTS.DT_SLIDER_SCALE);
}

export function sliderValueToDt(value: number): number {
  return value / SIMULATION_CONSTANTS.DT_SLIDER_SCALE;
}

const buttonStyle: React.CSSProperties = {
  padding: '8px 12px',
  color: 'white',
  border: 'none',
  borderRadius: '4px',
  cursor: 'pointer',
  fontSize: '11px',
};

const ControlPanel: React.FC<ControlPanelProps> = ({
  selectedPreset,
  dt,
  running,
  stepCount,
  elapsedTime,
  activeCount,
  particleCount,
  errorMessage,
  onPresetChange,
  onDtChange,
  onTogglePause,
  onReset,
}) => {
  return (
    <div
      style={{
        position: 'absolute',
        bottom: '10px',
        left: '10px',
        right: '10px',
        display: 'flex',
        alignItems: 'center',
        gap: '12px',
        background: 'rgba(30, 30, 40, 0.8)',
        color: 'white',
        padding: '8px',
        borderRadius: '10px',
        fontFamily: 'monospace',
        fontSize: '12px',
      }}
    >
      <select
        aria-label="Preset"
        value={selectedPreset}
        onChange={(e) => {
          const value = e.target.value;
          if (isPresetId(value)) {
            onPresetChange(value);
          }
        }}
        style={{
          padding: '4px',
          borderRadius: '3px',
          border: '1px solid #555',
          background: 'rgba(255, 255, 255, 0.1)',
          color: 'white',
          fontSize: '11px',
        }}
      >
        {PRESET_IDS.map((id) => (
          <option key={id} value={id} style={{ color: 'black' }}>
            {PRESETS[id].name}
          </option>
        ))}
      </select>

      <label htmlFor="dt-slider">Time step (dt): {dt.toFixed(4)}</label>
      <input
        id="dt-slider"
        type="range"
        min={SIMULATION_CONSTANTS.DT_SLIDER_MIN}
        max={SIMULATION_CONSTANTS.DT_SLIDER_MAX}
        step={1}
        value={dtToSliderValue(dt)}
        onChange={(e) => onDtChange(sliderValueToDt(parseInt(e.target.value, 10)))}
        style={{ flex: 1 }}
      />

      <button onClick={onTogglePause} style={{ ...buttonStyle, background: running ? '#f44336' : '#4CAF50' }}>
        {running ? 'Pause' : 'Resume'}
      </button>

      <button onClick={onReset} style={{ ...buttonStyle, background: '#2196F3' }}>
        Reset
      </button>

      <div style={{ fontSize: '10px', color: '#ccc', minWidth: '200px' }}>
        <div>
          Step: {stepCount} | t = {elapsedTime.toFixed(3)}
        </div>
        <div>
          Active: {activeCount}/{particleCount}
        </div>
      </div>

      {errorMessage && (
        <div role="alert" style={{ color: '#ff6b6b', fontSize: '11px' }}>
          {errorMessage}
        </div>
      )}
    </div>
  );
};

export default ControlPanel;
