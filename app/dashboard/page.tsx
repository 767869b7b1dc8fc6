export const dynamic = "force-dynamic";

import { checkConfig } from "@/lib/config";
import Header from "@/modules/home/ui/components/header";
import DashboardView from "@/modules/dashboard/ui/views/dashboard-view";

export default function DashboardPage() {
  const problem = checkConfig();

  return (
    <>
      <Header />
      <DashboardView configError={problem?.message ?? null} />
    </>
  );
}
