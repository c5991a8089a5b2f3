import { ModelResponse, parseChunkStream, StreamReuseError } from '../src';

// Stands in for a backend adapter that already translated the vendor stream
async function* providerStream(): AsyncGenerator<unknown> {
    yield 'The weather ';
    yield { text: 'in Paris', tool_calls: [{ index: 0, id: 'call_1', type: 'function', function: { name: 'get_weather', arguments: '{"city":' } }] };
    yield { text: '', tool_calls: [{ index: 0, function: { arguments: '"Paris"}' } }] };
}

async function main() {
    const response = ModelResponse.fromStream(parseChunkStream(providerStream()));

    for await (const { isFinal, delta } of response.iterate()) {
        process.stdout.write(delta);
        if (isFinal) process.stdout.write('\n');
    }

    console.log('Settled text:', await response.getText());
    console.log('Tool invocations:', response.getToolInvocations());
    console.log(response.toString());

    try {
        response.iterate();
    } catch (error) {
        if (error instanceof StreamReuseError) {
            console.log('Second iteration rejected:', error.message);
        } else {
            throw error;
        }
    }
}

main().catch(console.error);
