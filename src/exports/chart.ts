import QuickChart from "quickchart-js";
import type {
  CategoryCount,
  DailyCount,
  HourlyTypeCount,
  ResolutionStats,
} from "../shared/types.js";

/** Warm palette shared by the category and hourly charts. */
export const WARM = ["#8B0000", "#B22222", "#DC143C", "#FF4500", "#FF7F50", "#FFA500", "#FFB347", "#FFD580"];

export interface ChartDataset {
  label: string;
  data: Array<number | number[]>;
  [style: string]: unknown;
}

/** Chart.js (v2) configuration, as rendered by QuickChart. */
export interface ChartConfig {
  type: "horizontalBar" | "bar" | "line" | "boxplot";
  data: { labels: string[]; datasets: ChartDataset[] };
  options: Record<string, unknown>;
}

/** A chart configuration plus the QuickChart URL that renders it. */
export interface ChartSpec {
  title: string;
  config: ChartConfig;
  url: string;
}

export interface ChartSet {
  categories: ChartSpec;
  daily: ChartSpec;
  hourly: ChartSpec;
  resolution: ChartSpec;
}

function toSpec(title: string, config: ChartConfig, width = 800, height = 400): ChartSpec {
  const chart = new QuickChart();
  chart.setConfig(JSON.stringify(config));
  chart.setWidth(width);
  chart.setHeight(height);
  chart.setBackgroundColor("#ffffff");
  // getUrl only encodes the config; nothing is fetched here
  return { title, config, url: chart.getUrl() };
}

function titleOptions(text: string) {
  return { display: true, text, fontSize: 18 };
}

export function categoriesChart(counts: CategoryCount[], topN: number): ChartSpec {
  const title = `Top ${Math.min(topN, counts.length)} Complaint Types`;
  return toSpec(title, {
    type: "horizontalBar",
    data: {
      labels: counts.map((c) => c.complaintType),
      datasets: [
        {
          label: "Requests (count)",
          data: counts.map((c) => c.count),
          backgroundColor: counts.map((_, i) => WARM[i % WARM.length]),
        },
      ],
    },
    options: {
      title: titleOptions(title),
      legend: { display: false },
      scales: {
        xAxes: [{ scaleLabel: { display: true, labelString: "Requests (count)" }, ticks: { beginAtZero: true } }],
      },
    },
  });
}

export function dailyChart(series: DailyCount[]): ChartSpec {
  const title = "Complaints Over Time (Daily Counts)";
  return toSpec(title, {
    type: "line",
    data: {
      labels: series.map((d) => d.date),
      datasets: [
        {
          label: "Number of Requests",
          data: series.map((d) => d.count),
          borderColor: "#B22222",
          fill: false,
          tension: 0.2,
          pointRadius: 2,
        },
      ],
    },
    options: {
      title: titleOptions(title),
      legend: { display: false },
      scales: {
        xAxes: [{ scaleLabel: { display: true, labelString: "Date" } }],
        yAxes: [{ scaleLabel: { display: true, labelString: "Number of Requests" }, ticks: { beginAtZero: true } }],
      },
    },
  });
}

/** Stacked bars per hour for the leading complaint types. */
export function hourlyChart(counts: HourlyTypeCount[]): ChartSpec {
  const title = "How Top Complaints Evolve Through the Day";
  const hours = Array.from({ length: 24 }, (_, h) => h);
  const types: string[] = [];
  for (const c of counts) if (!types.includes(c.complaintType)) types.push(c.complaintType);

  const datasets = types.map((type, i) => ({
    label: type,
    backgroundColor: WARM[i % WARM.length],
    data: hours.map((h) => counts.find((c) => c.hour === h && c.complaintType === type)?.count ?? 0),
  }));

  return toSpec(title, {
    type: "bar",
    data: { labels: hours.map((h) => `${String(h).padStart(2, "0")}:00`), datasets },
    options: {
      title: titleOptions(title),
      legend: { position: "bottom" },
      scales: {
        xAxes: [{ stacked: true, scaleLabel: { display: true, labelString: "Hour of Day" } }],
        yAxes: [{ stacked: true, scaleLabel: { display: true, labelString: "Requests (count)" } }],
      },
    },
  });
}

export function resolutionChart(stats: ResolutionStats[]): ChartSpec {
  const title = `Resolution Time Distribution (Hours) - Top ${stats.length} Complaint Types`;
  return toSpec(title, {
    type: "boxplot",
    data: {
      labels: stats.map((s) => s.complaintType),
      datasets: [
        {
          label: "Hours to Close",
          backgroundColor: "rgba(255, 127, 80, 0.5)",
          borderColor: "#FF4500",
          data: stats.map((s) => s.hours),
        },
      ],
    },
    options: {
      title: titleOptions(title),
      legend: { display: false },
      scales: {
        yAxes: [{ scaleLabel: { display: true, labelString: "Hours to Close" } }],
      },
    },
  });
}
