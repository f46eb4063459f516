import { KNN } from "../src/ml/KNN";
import { loadTable } from "../src/utils/IO";
import { printTable } from "../src/utils/PrettyTable";
import { ScatterPlot } from "../src/utils/ScatterPlot";

// Load the reference data
const loaded = loadTable("./data/fruit.csv", { label: "fruit" });
if (!loaded.success) process.exit(1);
const table = loaded.data;
console.log(`✅ Loaded ${table.rowCount} rows.`);
printTable(table);

// Hold out a quarter of the rows for evaluation
const split = table.split(0.75);
if (!split.success) process.exit(1);
const { train, test } = split.data;

const created = KNN.create({
    table: train,
    k: 3,
    log: {
        modelName: "Fruit-KNN",
        verbose: true,
    },
});
if (!created.success) process.exit(1);
const knn = created.data;

knn.evaluate(test);

// Classify a raw measurement (label column omitted)
const query = [162, 7.7, "red"];
const predicted = knn.predict(query);
if (predicted.success) {
    console.log(`🔍 ${query.join(", ")} looks like a ${predicted.data}`);
}

// Plot the raw training features with the query marked
const plot = ScatterPlot.fromColumns(table, "weight_g", "diameter_cm", [162, 7.7]);
if (plot.success) plot.data.writeHtml("./fruit_scatter.html");
