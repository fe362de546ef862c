import { AdvanceDashboard } from "@/components/advance-dashboard";

export default function Home() {
  return <AdvanceDashboard />;
}
