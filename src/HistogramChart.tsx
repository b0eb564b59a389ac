import type { HistogramLayout } from './api.js';

// Draws the fixed histogram layout computed by the server. Geometry comes in
// canvas pixels, so the SVG viewBox matches the layout size 1:1.
export function HistogramChart({ layout }: { layout: HistogramLayout }) {
  const [yStart, yEnd] = layout.axes.y;
  const [xStart, xEnd] = layout.axes.x;

  return (
    <svg
      viewBox={`0 0 ${layout.width} ${layout.height}`}
      className="w-full h-auto bg-white rounded-xl"
      role="img"
      aria-label={layout.title.text}
    >
      <text
        x={layout.title.x}
        y={layout.title.y}
        textAnchor="middle"
        fontSize={18}
        fontWeight="bold"
      >
        {layout.title.text}
      </text>

      <line x1={yStart.x} y1={yStart.y} x2={yEnd.x} y2={yEnd.y} stroke="black" />
      <line x1={xStart.x} y1={xStart.y} x2={xEnd.x} y2={xEnd.y} stroke="black" />

      {layout.bars.map(bar => (
        <g key={bar.hour} data-testid={`bar-${bar.hour}`}>
          <rect
            x={bar.x1}
            y={bar.y2}
            width={bar.x2 - bar.x1}
            height={bar.height}
            fill={bar.fill}
            stroke="black"
          />
          <text x={bar.hourLabel.x} y={bar.hourLabel.y} textAnchor="middle" fontSize={12}>
            {bar.hourLabel.text}
          </text>
          {bar.countLabel && (
            <text x={bar.countLabel.x} y={bar.countLabel.y} textAnchor="middle" fontSize={12}>
              {bar.countLabel.text}
            </text>
          )}
        </g>
      ))}

      <text x={layout.yCaption.x} y={layout.yCaption.y} textAnchor="middle" fontSize={12}>
        {layout.yCaption.text}
      </text>
    </svg>
  );
}
