import express from 'express';
import http from 'http';
import path from 'path';
import dotenv from 'dotenv';
import { MessageParserService } from '../../src/message-parser-service';
import { MessageParserServiceConfig } from '../../src/types';

dotenv.config({ path: path.join(__dirname, '.env') });

const hostname = '127.0.0.1';
const port = 3001;
const messagesApiPath = "/api/messages";

// Parser defaults come from parserConstants.ts; the log level from MESSAGE_PARSER_LOG_LEVEL.
const serviceConfig: MessageParserServiceConfig = {
    instanceConfigPath: path.join(__dirname, 'app-parsers.yaml'),
    apiBasePath: messagesApiPath,
};

let parserService: MessageParserService;
try {
    parserService = new MessageParserService(serviceConfig);
    console.log(`Basic Server (Express): MessageParserService initialized using instance config: ${serviceConfig.instanceConfigPath}.`);
} catch (error) {
    console.error("Basic Server (Express): CRITICAL - Failed to initialize MessageParserService:", error);
    process.exit(1);
}

const app = express();

// Pre-parsed bodies are picked up by the service through req.body
app.use(express.json());

app.all(`${messagesApiPath}/*`, async (req, res) => {
    await parserService.handleRequest(req, res);
});

app.use((req, res) => {
    res.status(404).type('text/plain').send('Not Found');
});

const httpServer = http.createServer(app);
httpServer.listen(port, hostname, () => {
    console.log(`Server running at http://${hostname}:${port}/`);
});
