export type ThemeMode = 'Auto' | 'Light' | 'Dark';

export interface ChartStyle {
  template: 'plotly_white' | 'plotly_dark';
  paper: string;
  plot: string;
  font: string;
  axisLine: string;
  grid: string;
  fontSize: number;
  margin: { l: number; r: number; t: number; b: number };
  axis: {
    lineWidth: number;
    tickLength: number;
    tickWidth: number;
    gridWidth: number;
    mirror: boolean;
  };
}

const SHARED = {
  fontSize: 13,
  margin: { l: 12, r: 12, t: 46, b: 12 },
  axis: { lineWidth: 1.1, tickLength: 4, tickWidth: 1, gridWidth: 0.7, mirror: true },
};

/**
 * `Auto` follows the host theme base when it reports one, otherwise light.
 */
export function resolveDarkMode(mode: ThemeMode, themeBase?: string | null): boolean {
  switch (mode) {
    case 'Dark':
      return true;
    case 'Light':
      return false;
    case 'Auto':
      return (themeBase || 'light').toLowerCase() === 'dark';
  }
}

export function chartStyle(isDark: boolean): ChartStyle {
  if (isDark) {
    return {
      template: 'plotly_dark',
      paper: '#0f172a',
      plot: '#0f172a',
      font: '#e5e7eb',
      axisLine: 'rgba(255,255,255,0.55)',
      grid: 'rgba(255,255,255,0.10)',
      ...SHARED,
    };
  }
  return {
    template: 'plotly_white',
    paper: 'white',
    plot: 'white',
    font: '#111827',
    axisLine: 'rgba(0,0,0,0.55)',
    grid: 'rgba(0,0,0,0.10)',
    ...SHARED,
  };
}
