import { exportFileName, serializeBundle } from "@/lib/export";
import type { AnalysisBundle } from "@/lib/types";

export function downloadBundle(bundle: AnalysisBundle) {
  const blob = new Blob([serializeBundle(bundle)], { type: "application/json" });
  const url = URL.createObjectURL(blob);

  const link = document.createElement("a");
  link.href = url;
  link.download = exportFileName(new Date(bundle.generatedAt));
  document.body.appendChild(link);
  link.click();
  link.remove();
  URL.revokeObjectURL(url);
}
