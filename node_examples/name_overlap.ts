import { KNN } from "../src/ml/KNN";
import { JaccardDistance } from "../src/ml/Distance";
import { TypedTable } from "../src/core/TypedTable";

// Words built from two disjoint alphabets, grouped by alphabet
const words = [
    ["lorem", "soft"], ["morel", "soft"], ["romel", "soft"], ["mello", "soft"], ["lemor", "soft"],
    ["tuxit", "hard"], ["kitux", "hard"], ["xutik", "hard"], ["tikku", "hard"], ["kuxxi", "hard"],
];

const built = TypedTable.fromRows(["word", "group"], words, { label: "group" });
if (!built.success) process.exit(1);

const created = KNN.create({ table: built.data, k: 3, log: { modelName: "Word-KNN" } });
if (!created.success) process.exit(1);
const knn = created.data;

// Swap the default mixed measure for character overlap on the word column
const previous = knn.setDistanceMeasure(new JaccardDistance("word"));
console.log(`🔧 Replaced ${previous.name} distance with ${knn.getDistanceMeasure().name}`);

for (const word of process.argv.slice(2).length ? process.argv.slice(2) : ["merlo", "kutix"]) {
    const predicted = knn.predict([word]);
    if (predicted.success) console.log(`🔍 ${word} it seems to be a ${predicted.data} word!`);
}
