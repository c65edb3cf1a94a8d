/**
 * Plan a trip from the command line and print the response JSON.
 *
 * Run with: npx tsx server/scripts/planTrip.ts [from] [to] [departureDate] [returnDate] [passengers] [budget]
 * Defaults to Delhi (DEL) → Mumbai (BOM), 2025-12-20 to 2025-12-25, 2 travelers, mid budget.
 */

import "dotenv/config";
import { getConfig } from "../config";
import { createTripPlannerDeps, planTrip, toFailureResponse, toTravelPlanResponse } from "../services/tripPlanner";

async function main() {
  const [from = "Delhi (DEL)", to = "Mumbai (BOM)", departureDate = "2025-12-20", returnDate = "2025-12-25", passengers = "2", budget = "mid"] =
    process.argv.slice(2);

  const config = getConfig();

  try {
    const plan = await planTrip(
      { from, to, departureDate, returnDate, passengers, budget, travelClass: "economy", tripType: "roundtrip" },
      createTripPlannerDeps(config),
    );
    console.log(JSON.stringify(toTravelPlanResponse(plan), null, 2));
  } catch (error) {
    console.error(JSON.stringify(toFailureResponse(error), null, 2));
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
