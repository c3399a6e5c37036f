import React from 'react';

interface ScoreGaugeProps {
  score: number;
  label: string;
  color?: string;
}

const RADIUS = 52;
const CIRCUMFERENCE = 2 * Math.PI * RADIUS;

/**
 * Radial score ring as static SVG
 */
export const ScoreGauge: React.FC<ScoreGaugeProps> = ({ score, label, color = '#111111' }) => {
  const clamped = Math.max(0, Math.min(100, score));
  const dash = (clamped / 100) * CIRCUMFERENCE;

  return (
    <figure className="gauge">
      <svg width="128" height="128" viewBox="0 0 128 128" role="img" aria-label={`${label}: ${clamped.toFixed(1)}`}>
        <circle cx="64" cy="64" r={RADIUS} fill="none" stroke="#f3f4f6" strokeWidth="10" />
        <circle
          cx="64"
          cy="64"
          r={RADIUS}
          fill="none"
          stroke={color}
          strokeWidth="10"
          strokeLinecap="round"
          strokeDasharray={`${dash.toFixed(2)} ${CIRCUMFERENCE.toFixed(2)}`}
          transform="rotate(-90 64 64)"
        />
        <text x="64" y="72" textAnchor="middle" className="gauge-value">
          {clamped.toFixed(1)}
        </text>
      </svg>
      <figcaption>{label}</figcaption>
    </figure>
  );
};
