import { NaiveBayes } from "../src/core/NaiveBayes";

// Fixed Portuguese sentiment corpus: "bom" (good) vs "ruim" (bad)
const corpus: Record<string, string[]> = {
    bom: [
        "eu te adoro",
        "eu te amo",
        "eu amo batatas fritas",
        "eu amo bolo",
        "voce é demais",
        "bolo que é demais"
    ],
    ruim: [
        "peixe é ruim",
        "eu te odeio",
        "eu quero ver queimar",
        "eu quero é que se exploda",
        "eu acho que isso é muito ruim",
        "odeio ficar parado"
    ]
};

const classifier = new NaiveBayes({ nSplit: 1, log: { verbose: false } });

for (const [label, sentences] of Object.entries(corpus)) {
    sentences.forEach(sentence => classifier.train(label, sentence));
}

const scores = classifier.classify("nao achei o filme ruim");

process.stdout.write(scores["bom"] > scores["ruim"] ? "bom" : "ruim");
