// @vitest-environment jsdom
import { describe, it, expect, afterEach } from 'vitest';
import { render, screen, cleanup } from '@testing-library/react';
import { HistogramChart } from '../src/HistogramChart.js';
import { layoutHistogram } from '../server/histogram.js';

const caption = { airportName: 'Lisbon Portela', year: 2022 };

describe('HistogramChart', () => {
  afterEach(() => {
    cleanup();
  });

  it('renders the title, hour labels and one bar per hour', () => {
    const bins = [0, 0, 0, 0, 0, 0, 3, 1, 0, 0, 0, 0];
    render(<HistogramChart layout={layoutHistogram({ airlineCode: 'TP', bins }, caption)} />);

    expect(screen.getByRole('img', { name: 'TP Departures from Lisbon Portela 2022' })).toBeInTheDocument();
    expect(screen.getByText('00:00')).toBeInTheDocument();
    expect(screen.getByText('11:00')).toBeInTheDocument();
    expect(screen.getByText('Flights')).toBeInTheDocument();
    expect(document.querySelectorAll('rect')).toHaveLength(12);
  });

  it('labels only bars with departures', () => {
    const bins = [0, 0, 0, 0, 0, 0, 3, 1, 0, 0, 0, 0];
    render(<HistogramChart layout={layoutHistogram({ airlineCode: 'TP', bins }, caption)} />);

    expect(screen.getByTestId('bar-6')).toHaveTextContent('06:003');
    expect(screen.getByTestId('bar-7')).toHaveTextContent('07:001');
    expect(screen.getByTestId('bar-0')).toHaveTextContent(/^00:00$/);
  });

  it('sizes the tallest bar to the full plot height', () => {
    const bins = [0, 0, 0, 0, 0, 0, 3, 1, 0, 0, 0, 0];
    render(<HistogramChart layout={layoutHistogram({ airlineCode: 'TP', bins }, caption)} />);

    const tallest = screen.getByTestId('bar-6').querySelector('rect');
    expect(tallest).toHaveAttribute('height', '280');
    expect(tallest).toHaveAttribute('y', '70');
  });
});
