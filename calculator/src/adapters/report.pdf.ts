// ============================================================
// Deal report PDF rendering with jsPDF
// ============================================================

import { jsPDF } from "jspdf";
import type { ReportRendererPort } from "../core/ports";
import type { DealReport, ReportRow } from "../core/report";
import { modelDisplayName } from "../core/report";

// Colors (as tuples for jsPDF)
type RGB = [number, number, number];
const BLUE: RGB = [30, 64, 175];
const DARK: RGB = [15, 23, 42];
const GRAY: RGB = [100, 116, 139];
const LIGHT_GRAY: RGB = [226, 232, 240];
const GREEN: RGB = [22, 163, 74];
const RED: RGB = [220, 38, 38];
const AMBER: RGB = [217, 119, 6];
const WHITE: RGB = [255, 255, 255];
const BG_LIGHT: RGB = [248, 250, 252];

const ROW_HEIGHT = 16;

function colorForLabel(value: string): RGB {
  switch (value) {
    case "Positive":
    case "Strong":
    case "Excellent":
    case "Meets":
      return GREEN;
    case "Moderate":
    case "Break-even":
      return AMBER;
    default:
      return RED;
  }
}

export class JsPdfReportRenderer implements ReportRendererPort {
  async render(report: DealReport): Promise<Uint8Array> {
    const doc = new jsPDF({ orientation: "portrait", unit: "pt", format: "letter" });
    const W = doc.internal.pageSize.getWidth();
    const H = doc.internal.pageSize.getHeight();
    const ML = 40; // margin left
    const MR = 40; // margin right
    const CW = W - ML - MR; // content width
    let page = 1;
    let y = 0;

    function addFooter() {
      doc.setFontSize(7);
      doc.setFont("helvetica", "normal");
      doc.setTextColor(...GRAY);
      doc.text(`${report.title} - Page ${page}`, ML, H - 20);
      doc.text(report.generatedAt.slice(0, 10), W - MR, H - 20, { align: "right" });
    }

    function ensureSpace(needed: number) {
      if (y + needed <= H - 50) return;
      addFooter();
      doc.addPage();
      page++;
      y = 50;
    }

    function sectionTitle(text: string) {
      ensureSpace(40);
      doc.setFontSize(12);
      doc.setTextColor(...BLUE);
      doc.setFont("helvetica", "bold");
      doc.text(text, ML, y);
      doc.setDrawColor(...LIGHT_GRAY);
      doc.setLineWidth(0.5);
      doc.line(ML, y + 4, W - MR, y + 4);
      y += 20;
    }

    function table(rows: ReportRow[], colored = false) {
      rows.forEach((row, i) => {
        ensureSpace(ROW_HEIGHT);
        if (i % 2 === 0) {
          doc.setFillColor(...BG_LIGHT);
          doc.rect(ML, y - 11, CW, ROW_HEIGHT, "F");
        }
        doc.setFontSize(9);
        doc.setFont("helvetica", "normal");
        doc.setTextColor(...GRAY);
        doc.text(row.label, ML + 5, y);
        doc.setFont("helvetica", "bold");
        doc.setTextColor(...(colored ? colorForLabel(row.value) : DARK));
        doc.text(row.value, W - MR - 5, y, { align: "right" });
        y += ROW_HEIGHT;
      });
      y += 14;
    }

    // Header bar
    doc.setFillColor(...BLUE);
    doc.rect(0, 0, W, 60, "F");
    doc.setTextColor(...WHITE);
    doc.setFontSize(20);
    doc.setFont("helvetica", "bold");
    doc.text(report.title, ML, 38);
    doc.setFontSize(9);
    doc.setFont("helvetica", "normal");
    doc.text(modelDisplayName(report.model), W - MR, 38, { align: "right" });

    y = 90;
    doc.setTextColor(...GRAY);
    doc.setFontSize(9);
    doc.text(`Generated ${report.generatedAt}`, ML, y);
    y += 25;

    sectionTitle("Property Details");
    table(report.propertyDetails);

    sectionTitle("Financial Analysis");
    table(report.financialAnalysis);

    sectionTitle("Financial Heuristics");
    table(report.heuristics, true);

    if (report.notes) {
      sectionTitle("Notes");
      doc.setFontSize(9);
      doc.setFont("helvetica", "normal");
      doc.setTextColor(...DARK);
      const lines: string[] = doc.splitTextToSize(report.notes, CW);
      for (const line of lines) {
        ensureSpace(12);
        doc.text(line, ML, y);
        y += 12;
      }
    }

    addFooter();
    return new Uint8Array(doc.output("arraybuffer"));
  }
}
